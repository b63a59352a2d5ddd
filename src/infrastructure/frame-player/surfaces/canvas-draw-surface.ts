import type { Bounds, DrawSurface, RasterImage } from '@domain/frame-player/index.js';
import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';

/** Draw surface over a 2D canvas context. Frames are alpha-composited. */
export class CanvasDrawSurface implements DrawSurface {
  public constructor(public readonly context: SKRSContext2D) {}

  public static create(width: number, height: number): CanvasDrawSurface {
    return new CanvasDrawSurface(createCanvas(width, height).getContext('2d'));
  }

  public blit(image: RasterImage, bounds: Bounds): void {
    const scratch = createCanvas(image.width, image.height);
    const scratchContext = scratch.getContext('2d');
    const imageData = scratchContext.createImageData(image.width, image.height);
    imageData.data.set(image.data);
    scratchContext.putImageData(imageData, 0, 0);

    this.context.drawImage(scratch, Math.round(bounds.x), Math.round(bounds.y));
  }

  public clear(): void {
    const { width, height } = this.context.canvas;
    this.context.clearRect(0, 0, width, height);
  }

  public toPng(): Buffer {
    return this.context.canvas.toBuffer('image/png');
  }
}
