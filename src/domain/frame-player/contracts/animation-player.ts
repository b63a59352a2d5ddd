import type { DrawSurface } from './draw-surface.js';
import type { Direction, Scale } from '../value-objects/raster-image.js';

export interface FrameTransform {
  readonly direction: Direction;
  readonly scale: Scale;
  readonly angle: number;
}

export type CompleteCallback = () => void;
export type FrameChangeCallback = (frameIndex: number) => void;
export type StateChangeCallback = (state: string) => void;

export interface AnimationPlayer {
  /**
   * Advances playback by `dt` seconds. Transform fields that are omitted keep
   * their current values.
   */
  update(dt: number, transform?: Partial<FrameTransform>): void;
  setState(state: string, resetFrame?: boolean): void;
  draw(surface: DrawSurface): void;
  addCompleteCallback(callback: CompleteCallback): void;
  addFrameChangeCallback(callback: FrameChangeCallback): void;
  addStateChangeCallback(callback: StateChangeCallback): void;
  release(): boolean;
  readonly isPlaying: boolean;
}
