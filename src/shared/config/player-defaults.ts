import type { PlayMode } from '@domain/frame-player/value-objects/play-mode.js';
import type { Rgba, Scale } from '@domain/frame-player/value-objects/raster-image.js';

import { getEnvironment } from './environment.js';

export const PLAYER_DEFAULTS = {
  maxCacheSize: 200,
  minCacheSize: 10,
  playMode: 'loop' satisfies PlayMode,
  originalScale: { width: 0, height: 0 } satisfies Scale,
  placeholderSize: { width: 32, height: 32 } satisfies Scale,
  placeholderColor: [255, 0, 0, 255] satisfies Rgba,
  sampleKeyCount: 3,
  debugFontSize: 16,
} as const;

export function resolveDefaultCacheSize(): number {
  return getEnvironment().FRAME_CACHE_MAX_ENTRIES ?? PLAYER_DEFAULTS.maxCacheSize;
}
