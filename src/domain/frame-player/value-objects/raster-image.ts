/**
 * Decoded RGBA image. `data` holds `width * height * 4` bytes, row-major.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export type Rgba = readonly [number, number, number, number];

/** Output size; `{ width: 0, height: 0 }` keeps the image's natural size. */
export interface Scale {
  readonly width: number;
  readonly height: number;
}

export interface Direction {
  readonly flipX: boolean;
  readonly flipY: boolean;
}

export const NO_FLIP: Direction = { flipX: false, flipY: false };

export function createRaster(width: number, height: number, fill?: Rgba): RasterImage {
  const data = new Uint8ClampedArray(width * height * 4);

  if (fill) {
    for (let index = 0; index < data.length; index += 4) {
      data[index] = fill[0];
      data[index + 1] = fill[1];
      data[index + 2] = fill[2];
      data[index + 3] = fill[3];
    }
  }

  return { width, height, data };
}

export function cloneRaster(image: RasterImage): RasterImage {
  return { width: image.width, height: image.height, data: new Uint8ClampedArray(image.data) };
}

export function pixelAt(image: RasterImage, x: number, y: number): Rgba {
  const index = (y * image.width + x) * 4;
  return [
    image.data[index] ?? 0,
    image.data[index + 1] ?? 0,
    image.data[index + 2] ?? 0,
    image.data[index + 3] ?? 0,
  ];
}

export const isOriginalScale = (scale: Scale): boolean => scale.width === 0 && scale.height === 0;

export const sameScale = (a: Scale, b: Scale): boolean => a.width === b.width && a.height === b.height;

export const sameDirection = (a: Direction, b: Direction): boolean =>
  a.flipX === b.flipX && a.flipY === b.flipY;
