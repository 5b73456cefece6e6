/**
 * @clipferry/pipeline
 * 
 * Batch orchestration: discover, probe, transcode, extract subtitles,
 * transfer and clean up, one asset at a time.
 */

export { PipelineOrchestrator, isSuccessful, type PipelineOrchestratorOptions } from './orchestrator.js';
export type { PipelineEvent, PipelineEventListener, PipelineStage } from './types.js';
