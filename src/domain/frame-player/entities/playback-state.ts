import { AppError } from '@/shared/errors/app-error.js';

import type {
  CompleteCallback,
  FrameChangeCallback,
  StateChangeCallback,
} from '../contracts/animation-player.js';
import type { PlayerLogger } from '../contracts/player-logger.js';
import { isPlayMode, PLAY_MODES, type PlayMode } from '../value-objects/play-mode.js';

import { type DispatchReport, ObserverRegistry } from './observer-registry.js';

/** Result of one frame boundary crossing. */
export interface FrameAdvance {
  readonly previousIndex: number;
  readonly index: number;
  readonly completed: boolean;
}

export interface PlaybackStateOptions {
  /** Frame count per state, in declaration order. */
  readonly frameCounts: ReadonlyMap<string, number>;
  readonly playMode: PlayMode;
  readonly logger: PlayerLogger;
}

/**
 * Playback cursor and event registries of one player.
 *
 * `currentState` is `null` while paused (idle). The frame index and elapsed
 * time survive a pause so that resuming continues where playback stopped.
 */
export class PlaybackStateManager {
  private current: string | null = null;

  private lastActive: string | null = null;

  private index = 0;

  private elapsed = 0;

  private mode: PlayMode;

  private pingpongDirection: 1 | -1 = 1;

  private readonly frameCounts: ReadonlyMap<string, number>;

  private readonly completeObservers: ObserverRegistry<[]>;

  private readonly frameChangeObservers: ObserverRegistry<[number]>;

  private readonly stateChangeObservers: ObserverRegistry<[string]>;

  public constructor(options: PlaybackStateOptions) {
    this.frameCounts = options.frameCounts;
    this.mode = options.playMode;
    this.completeObservers = new ObserverRegistry('complete', options.logger);
    this.frameChangeObservers = new ObserverRegistry('frame-change', options.logger);
    this.stateChangeObservers = new ObserverRegistry('state-change', options.logger);
  }

  public get currentState(): string | null {
    return this.current;
  }

  public get frameIndex(): number {
    return this.index;
  }

  public get timeSinceLastFrame(): number {
    return this.elapsed;
  }

  public get playMode(): PlayMode {
    return this.mode;
  }

  public get direction(): 1 | -1 {
    return this.pingpongDirection;
  }

  public get declaredStates(): string[] {
    return [...this.frameCounts.keys()];
  }

  public setState(state: string, resetFrame = true): void {
    const frameCount = this.frameCounts.get(state);
    if (frameCount === undefined) {
      throw AppError.usage('frame-player.unknown-state', `Invalid state: ${state}`, {
        state,
        availableStates: this.declaredStates,
      });
    }

    if (state === this.current) {
      return;
    }

    this.current = state;
    this.lastActive = state;

    if (resetFrame) {
      this.rewind();
    } else if (this.index >= frameCount) {
      this.index = frameCount - 1;
    }

    this.stateChangeObservers.dispatch(state);
  }

  public pause(): void {
    this.current = null;
  }

  /**
   * Re-enters the state that was active before the pause, or the first
   * declared state when none ever was. Returns whether playback restarted.
   */
  public resume(): boolean {
    if (this.current !== null) {
      return false;
    }

    const target = this.lastActive ?? this.declaredStates[0];
    if (target === undefined) {
      return false;
    }

    this.current = target;
    return true;
  }

  public rewind(): void {
    this.index = 0;
    this.elapsed = 0;
    this.pingpongDirection = 1;
  }

  public setPlayMode(mode: string): void {
    if (!isPlayMode(mode)) {
      throw AppError.configuration('frame-player.invalid-play-mode', `Invalid play mode: ${mode}`, {
        mode,
        allowed: PLAY_MODES,
      });
    }

    this.mode = mode;
  }

  /** Adds `dt` seconds to the frame timer. Returns `false`, leaving the timer as is, for a negative or non-finite step. */
  public accumulate(dt: number): boolean {
    if (!Number.isFinite(dt) || dt < 0) {
      return false;
    }

    this.elapsed += dt;
    return true;
  }

  /**
   * Crosses every frame boundary the accumulated time allows. Without
   * `carryRemainder` the elapsed time is reset at a boundary, so at most one
   * boundary is crossed per call.
   */
  public advanceIfDue(frameDuration: number, carryRemainder = false): FrameAdvance[] {
    const steps: FrameAdvance[] = [];

    while (this.current !== null && this.elapsed >= frameDuration) {
      this.elapsed = carryRemainder ? this.elapsed - frameDuration : 0;
      steps.push(this.advance());
    }

    return steps;
  }

  /** Applies the play mode's transition for one frame boundary. */
  public advance(): FrameAdvance {
    const previousIndex = this.index;
    const frameCount = this.current === null ? 0 : (this.frameCounts.get(this.current) ?? 0);

    if (frameCount === 0) {
      return { previousIndex, index: previousIndex, completed: false };
    }

    let completed = false;

    switch (this.mode) {
      case 'loop': {
        this.index = (this.index + 1) % frameCount;
        break;
      }
      case 'once': {
        const next = this.index + 1;
        if (next >= frameCount) {
          this.index = frameCount - 1;
          completed = true;
          this.pause();
        } else {
          this.index = next;
        }
        break;
      }
      case 'pingpong': {
        let next = this.index + this.pingpongDirection;
        if (next < 0 || next >= frameCount) {
          this.pingpongDirection = this.pingpongDirection === 1 ? -1 : 1;
          next = Math.max(0, Math.min(next + this.pingpongDirection * 2, frameCount - 1));
          completed = true;
        }
        this.index = next;
        break;
      }
      default: {
        const exhaustive: never = this.mode;
        throw AppError.configuration('frame-player.invalid-play-mode', 'Unsupported play mode', {
          mode: exhaustive,
        });
      }
    }

    return { previousIndex, index: this.index, completed };
  }

  public addCompleteCallback(callback: CompleteCallback): boolean {
    return this.completeObservers.add(callback);
  }

  public addFrameChangeCallback(callback: FrameChangeCallback): boolean {
    return this.frameChangeObservers.add(callback);
  }

  public addStateChangeCallback(callback: StateChangeCallback): boolean {
    return this.stateChangeObservers.add(callback);
  }

  public notifyFrameChange(frameIndex: number = this.index): DispatchReport {
    return this.frameChangeObservers.dispatch(frameIndex);
  }

  public notifyComplete(): DispatchReport {
    return this.completeObservers.dispatch();
  }

  /** Stops playback and drops every registered observer. */
  public release(): void {
    this.pause();
    this.lastActive = null;
    this.completeObservers.clear();
    this.frameChangeObservers.clear();
    this.stateChangeObservers.clear();
  }
}
