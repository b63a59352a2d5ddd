import type { RasterImage, Scale } from '../value-objects/raster-image.js';

/** Pure image operations. Each returns a new image and never mutates its input. */
export interface ImageTransformer {
  scale(image: RasterImage, size: Scale): RasterImage;
  flip(image: RasterImage, flipX: boolean, flipY: boolean): RasterImage;
  /** Counter-clockwise rotation in degrees. */
  rotate(image: RasterImage, degrees: number): RasterImage;
}
