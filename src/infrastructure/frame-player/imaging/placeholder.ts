import { createRaster, type RasterImage } from '@domain/frame-player/index.js';

import { PLAYER_DEFAULTS } from '@/shared/config/player-defaults.js';

/** Solid red square shown in place of a frame that failed to materialize. */
export function createPlaceholderImage(): RasterImage {
  const { width, height } = PLAYER_DEFAULTS.placeholderSize;
  return createRaster(width, height, PLAYER_DEFAULTS.placeholderColor);
}
