import type { RasterImage } from './raster-image.js';

/**
 * Frames of every state, in one representation chosen at construction.
 * `direct` states hold decoded images; `named` states hold names resolved
 * through an {@link ImageSource} and materialized via the frame cache.
 */
export type FrameStore =
  | { readonly kind: 'direct'; readonly states: ReadonlyMap<string, readonly RasterImage[]> }
  | { readonly kind: 'named'; readonly states: ReadonlyMap<string, readonly string[]> };

export type FrameReference = string | RasterImage;
