import type { RasterImage } from '../value-objects/raster-image.js';

export interface ImageSource {
  /**
   * Loads and retains the named image. Called once per frame name while a
   * player is constructed; throws a resource error when the name cannot be
   * loaded.
   */
  preload(name: string): void;

  /** Returns the retained image; throws a resource error for unknown names. */
  resolve(name: string): RasterImage;
}
