import type { PlayerLogger, RasterImage, Rgba } from '@domain/frame-player/index.js';
import { createRaster } from '@domain/frame-player/index.js';
import { vi } from 'vitest';

export const RED: Rgba = [255, 0, 0, 255];
export const GREEN: Rgba = [0, 255, 0, 255];
export const BLUE: Rgba = [0, 0, 255, 255];
export const WHITE: Rgba = [255, 255, 255, 255];

export function solidFrame(color: Rgba, width = 2, height = 2): RasterImage {
  return createRaster(width, height, color);
}

/** 2x1 image: `left` at x=0, `right` at x=1. */
export function twoPixelFrame(left: Rgba, right: Rgba): RasterImage {
  return { width: 2, height: 1, data: new Uint8ClampedArray([...left, ...right]) };
}

export function createLoggerStub() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } satisfies PlayerLogger;
}

export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the action to throw');
}
