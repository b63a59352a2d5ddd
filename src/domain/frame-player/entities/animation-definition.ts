import { PLAYER_DEFAULTS, resolveDefaultCacheSize } from '@/shared/config/player-defaults.js';
import { AppError } from '@/shared/errors/app-error.js';

import type { FrameReference, FrameStore } from '../value-objects/frame-store.js';
import { isPlayMode, PLAY_MODES, type PlayMode } from '../value-objects/play-mode.js';
import { cloneRaster, isOriginalScale, type RasterImage, type Scale } from '../value-objects/raster-image.js';

export interface AnimationDefinitionProps {
  readonly frames: Readonly<Record<string, readonly FrameReference[]>>;
  /** Seconds each frame of a state stays on screen. */
  readonly durations: Readonly<Record<string, number>>;
  readonly frameScale?: Scale;
  readonly maxCacheSize?: number;
  readonly playMode?: string;
  readonly carryRemainder?: boolean;
}

export class AnimationDefinition {
  public readonly frames: FrameStore;

  public readonly durations: ReadonlyMap<string, number>;

  public readonly frameScale: Scale;

  public readonly maxCacheSize: number;

  public readonly playMode: PlayMode;

  public readonly carryRemainder: boolean;

  private constructor(props: {
    frames: FrameStore;
    durations: ReadonlyMap<string, number>;
    frameScale: Scale;
    maxCacheSize: number;
    playMode: PlayMode;
    carryRemainder: boolean;
  }) {
    this.frames = props.frames;
    this.durations = props.durations;
    this.frameScale = props.frameScale;
    this.maxCacheSize = props.maxCacheSize;
    this.playMode = props.playMode;
    this.carryRemainder = props.carryRemainder;
  }

  /**
   * Checks every construction-time invariant and snapshots the frames.
   * Direct images are copied so later edits by the caller do not leak into
   * playback.
   */
  public static create(props: AnimationDefinitionProps): AnimationDefinition {
    const stateNames = Object.keys(props.frames);

    if (stateNames.length === 0) {
      throw AppError.configuration('animation.no-states', 'frames must declare at least one state');
    }

    if (stateNames.includes('')) {
      throw AppError.configuration('animation.invalid-state-name', 'State names must not be empty');
    }

    assertStateParity(stateNames, Object.keys(props.durations));

    const durations = new Map<string, number>();
    for (const state of stateNames) {
      const duration = props.durations[state];
      if (duration === undefined || !Number.isFinite(duration) || duration <= 0) {
        throw AppError.configuration(
          'animation.invalid-duration',
          `durations["${state}"] must be a positive number of seconds`,
          { state, duration },
        );
      }
      durations.set(state, duration);
    }

    const frameScale = props.frameScale ?? PLAYER_DEFAULTS.originalScale;
    if (!isValidScale(frameScale)) {
      throw AppError.configuration(
        'animation.invalid-scale',
        'frameScale must be { width: 0, height: 0 } or two positive integers',
        { frameScale },
      );
    }

    const maxCacheSize = props.maxCacheSize ?? resolveDefaultCacheSize();
    if (!Number.isInteger(maxCacheSize) || maxCacheSize < PLAYER_DEFAULTS.minCacheSize) {
      throw AppError.configuration(
        'frame-cache.size-below-minimum',
        `maxCacheSize must be an integer greater than or equal to ${PLAYER_DEFAULTS.minCacheSize}`,
        { maxCacheSize },
      );
    }

    const playMode = props.playMode ?? PLAYER_DEFAULTS.playMode;
    if (!isPlayMode(playMode)) {
      throw AppError.configuration('animation.invalid-play-mode', `Invalid play mode: ${playMode}`, {
        playMode,
        allowed: PLAY_MODES,
      });
    }

    return new AnimationDefinition({
      frames: buildFrameStore(stateNames, props.frames),
      durations,
      frameScale,
      maxCacheSize,
      playMode,
      carryRemainder: props.carryRemainder ?? false,
    });
  }

  public get stateNames(): string[] {
    return [...this.frames.states.keys()];
  }

  public get frameCounts(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const state of this.stateNames) {
      counts.set(state, this.frames.states.get(state)?.length ?? 0);
    }
    return counts;
  }

  public durationOf(state: string): number {
    const duration = this.durations.get(state);
    if (duration === undefined) {
      throw AppError.usage('frame-player.unknown-state', `Invalid state: ${state}`, { state });
    }
    return duration;
  }
}

function assertStateParity(frameStates: readonly string[], durationStates: readonly string[]): void {
  const frameSet = new Set(frameStates);
  const durationSet = new Set(durationStates);
  const missing = [
    ...frameStates.filter((state) => !durationSet.has(state)),
    ...durationStates.filter((state) => !frameSet.has(state)),
  ].sort();

  if (missing.length > 0) {
    throw AppError.configuration(
      'animation.state-mismatch',
      `States definition incomplete, missing: ${missing.join(', ')}`,
      { missing },
    );
  }
}

function buildFrameStore(
  stateNames: readonly string[],
  frames: Readonly<Record<string, readonly FrameReference[]>>,
): FrameStore {
  const firstState = stateNames[0] ?? '';
  const kind = typeof frames[firstState]?.[0] === 'string' ? 'named' : 'direct';
  const named = new Map<string, string[]>();
  const direct = new Map<string, RasterImage[]>();

  for (const state of stateNames) {
    const list = frames[state] ?? [];
    if (list.length === 0) {
      throw AppError.configuration('animation.empty-state', `frames["${state}"] must not be empty`, {
        state,
      });
    }

    list.forEach((frame, index) => {
      if (typeof frame === 'string') {
        if (kind !== 'named') {
          throw mixedFrames(state, index);
        }
        if (frame.length === 0) {
          throw AppError.configuration(
            'animation.invalid-frame-name',
            `frames["${state}"][${index}] must be a non-empty name`,
            { state, index },
          );
        }
        return;
      }

      if (kind !== 'direct') {
        throw mixedFrames(state, index);
      }
      if (!isValidRaster(frame)) {
        throw AppError.configuration(
          'animation.invalid-image',
          `frames["${state}"][${index}] is not a valid RGBA image`,
          { state, index, width: frame.width, height: frame.height },
        );
      }
    });

    if (kind === 'named') {
      named.set(state, list.filter((frame): frame is string => typeof frame === 'string'));
    } else {
      direct.set(
        state,
        list.filter((frame): frame is RasterImage => typeof frame !== 'string').map(cloneRaster),
      );
    }
  }

  return kind === 'named' ? { kind, states: named } : { kind, states: direct };
}

function mixedFrames(state: string, index: number): AppError {
  return AppError.configuration(
    'animation.mixed-frame-types',
    `frames["${state}"][${index}] does not match the frame type of the first state`,
    { state, index },
  );
}

function isValidRaster(image: RasterImage): boolean {
  return (
    Number.isInteger(image.width) &&
    Number.isInteger(image.height) &&
    image.width > 0 &&
    image.height > 0 &&
    image.data instanceof Uint8ClampedArray &&
    image.data.length === image.width * image.height * 4
  );
}

function isValidScale(scale: Scale): boolean {
  if (!Number.isInteger(scale.width) || !Number.isInteger(scale.height)) {
    return false;
  }

  return isOriginalScale(scale) || (scale.width > 0 && scale.height > 0);
}
