/**
 * Pipeline Types
 */

import type { AssetResult } from '@clipferry/core';

export type PipelineStage = 'probe' | 'transcode' | 'subtitles' | 'transfer' | 'cleanup';

export type PipelineEvent =
  | { type: 'discovered'; total: number }
  | { type: 'asset-started'; index: number; total: number; relativePath: string }
  | { type: 'stage'; relativePath: string; stage: PipelineStage }
  | { type: 'asset-finished'; index: number; total: number; result: AssetResult };

export type PipelineEventListener = (event: PipelineEvent) => void;
