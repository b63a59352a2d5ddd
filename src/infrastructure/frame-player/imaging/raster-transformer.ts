import type { ImageTransformer, RasterImage, Scale } from '@domain/frame-player/index.js';
import { cloneRaster, createRaster, isOriginalScale } from '@domain/frame-player/index.js';

const DEGREES_TO_RADIANS = Math.PI / 180;
const SIZE_EPSILON = 1e-9;

/** Nearest-neighbour transforms over RGBA rasters. */
export class RasterTransformer implements ImageTransformer {
  public scale(image: RasterImage, size: Scale): RasterImage {
    if (isOriginalScale(size) || (size.width === image.width && size.height === image.height)) {
      return cloneRaster(image);
    }

    const result = createRaster(size.width, size.height);

    for (let y = 0; y < size.height; y += 1) {
      const sourceY = Math.min(image.height - 1, Math.floor(((y + 0.5) * image.height) / size.height));
      for (let x = 0; x < size.width; x += 1) {
        const sourceX = Math.min(image.width - 1, Math.floor(((x + 0.5) * image.width) / size.width));
        copyPixel(image, sourceX, sourceY, result, x, y);
      }
    }

    return result;
  }

  public flip(image: RasterImage, flipX: boolean, flipY: boolean): RasterImage {
    if (!flipX && !flipY) {
      return cloneRaster(image);
    }

    const result = createRaster(image.width, image.height);

    for (let y = 0; y < image.height; y += 1) {
      const sourceY = flipY ? image.height - 1 - y : y;
      for (let x = 0; x < image.width; x += 1) {
        const sourceX = flipX ? image.width - 1 - x : x;
        copyPixel(image, sourceX, sourceY, result, x, y);
      }
    }

    return result;
  }

  /**
   * Rotates counter-clockwise. The output grows to the axis-aligned box of the
   * rotated image; uncovered pixels are transparent.
   */
  public rotate(image: RasterImage, degrees: number): RasterImage {
    const normalized = ((degrees % 360) + 360) % 360;
    if (normalized === 0) {
      return cloneRaster(image);
    }

    const radians = normalized * DEGREES_TO_RADIANS;
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    const width = Math.max(1, Math.ceil(Math.abs(image.width * cos) + Math.abs(image.height * sin) - SIZE_EPSILON));
    const height = Math.max(1, Math.ceil(Math.abs(image.width * sin) + Math.abs(image.height * cos) - SIZE_EPSILON));
    const result = createRaster(width, height);

    const sourceCenterX = image.width / 2;
    const sourceCenterY = image.height / 2;
    const targetCenterX = width / 2;
    const targetCenterY = height / 2;

    for (let y = 0; y < height; y += 1) {
      const offsetY = y + 0.5 - targetCenterY;
      for (let x = 0; x < width; x += 1) {
        const offsetX = x + 0.5 - targetCenterX;
        const sourceX = Math.floor(offsetX * cos - offsetY * sin + sourceCenterX);
        const sourceY = Math.floor(offsetX * sin + offsetY * cos + sourceCenterY);

        if (sourceX >= 0 && sourceX < image.width && sourceY >= 0 && sourceY < image.height) {
          copyPixel(image, sourceX, sourceY, result, x, y);
        }
      }
    }

    return result;
  }
}

function copyPixel(
  source: RasterImage,
  sourceX: number,
  sourceY: number,
  target: RasterImage,
  targetX: number,
  targetY: number,
): void {
  const from = (sourceY * source.width + sourceX) * 4;
  const to = (targetY * target.width + targetX) * 4;
  target.data[to] = source.data[from] ?? 0;
  target.data[to + 1] = source.data[from + 1] ?? 0;
  target.data[to + 2] = source.data[from + 2] ?? 0;
  target.data[to + 3] = source.data[from + 3] ?? 0;
}
