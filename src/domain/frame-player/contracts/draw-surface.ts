import type { Bounds } from '../value-objects/bounds.js';
import type { RasterImage } from '../value-objects/raster-image.js';

export interface DrawSurface {
  blit(image: RasterImage, bounds: Bounds): void;
}
