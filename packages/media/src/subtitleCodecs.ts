/**
 * Subtitle codec families
 */

import type { SubtitleFamily } from '@clipferry/core';

const STYLE_CODECS = new Set(['ass', 'ssa']);

const IMAGE_CODECS = new Set([
  'dvd_subtitle',
  'dvdsub',
  'hdmv_pgs_subtitle',
  'pgssub',
  'dvb_subtitle',
  'xsub',
]);

/**
 * Anything not known to be styled or bitmap is extracted as plain text
 */
export function classifySubtitleCodec(codecName: string): SubtitleFamily {
  const codec = codecName.trim().toLowerCase();
  if (STYLE_CODECS.has(codec)) return 'style';
  if (IMAGE_CODECS.has(codec)) return 'image';
  return 'text';
}
