import type { ImageSource, RasterImage } from '@domain/frame-player/index.js';

import { AppError } from '@/shared/errors/app-error.js';

/** Image source backed by images the host already decoded. */
export class MapImageSource implements ImageSource {
  private readonly images: Map<string, RasterImage>;

  public constructor(images: Readonly<Record<string, RasterImage>> = {}) {
    this.images = new Map(Object.entries(images));
  }

  public set(name: string, image: RasterImage): void {
    this.images.set(name, image);
  }

  public preload(name: string): void {
    this.resolve(name);
  }

  public resolve(name: string): RasterImage {
    const image = this.images.get(name);
    if (!image) {
      throw AppError.notFound('image-source.not-found', `Invalid image resource: ${name}`, { name });
    }
    return image;
  }
}
