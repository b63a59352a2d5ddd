import { readFileSync } from 'node:fs';
import path from 'node:path';

import type { ImageSource, RasterImage } from '@domain/frame-player/index.js';
import { PNG } from 'pngjs';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

export interface PngFileImageSourceOptions {
  /** Directory that relative frame names are resolved against. */
  readonly rootDir?: string;
}

/**
 * Decodes PNG files named by frame references. Files are read once, during
 * `preload`; `resolve` only serves what was already decoded.
 */
export class PngFileImageSource implements ImageSource {
  private readonly logger = createChildLogger({ module: 'PngFileImageSource' });

  private readonly rootDir: string;

  private readonly decoded = new Map<string, RasterImage>();

  public constructor(options: PngFileImageSourceOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
  }

  public preload(name: string): void {
    if (this.decoded.has(name)) {
      return;
    }

    const filePath = path.resolve(this.rootDir, name);

    try {
      const png = PNG.sync.read(readFileSync(filePath));
      this.decoded.set(name, {
        width: png.width,
        height: png.height,
        data: new Uint8ClampedArray(png.data),
      });
      this.logger.debug({ name, width: png.width, height: png.height }, 'Decoded PNG frame');
    } catch (error) {
      throw AppError.resource('image-source.load-failed', `Cannot load image resource "${name}"`, error, {
        name,
        filePath,
      });
    }
  }

  public resolve(name: string): RasterImage {
    const image = this.decoded.get(name);
    if (!image) {
      throw AppError.notFound('image-source.not-found', `Invalid image resource: ${name}`, { name });
    }
    return image;
  }
}
