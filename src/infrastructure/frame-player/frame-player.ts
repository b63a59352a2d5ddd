import type {
  AnimationPlayer,
  Bounds,
  CompleteCallback,
  DrawSurface,
  FrameAdvance,
  FrameChangeCallback,
  FrameTransform,
  ImageSource,
  ImageTransformer,
  PlayerLogger,
  PlayMode,
  Point,
  RasterImage,
  StateChangeCallback,
} from '@domain/frame-player/index.js';
import {
  AnimationDefinition,
  boundsAround,
  centerOf,
  cloneRaster,
  type Direction,
  isOriginalScale,
  NO_FLIP,
  PlaybackStateManager,
  sameDirection,
  sameScale,
  type Scale,
} from '@domain/frame-player/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { FrameCacheManager, type FrameCacheInfo } from './cache/frame-cache.js';
import { createPlaceholderImage } from './imaging/placeholder.js';
import { RasterTransformer } from './imaging/raster-transformer.js';
import { PngFileImageSource } from './sources/png-file-image-source.js';

export interface FramePlayerInjection {
  /** Resolves symbolic frame names. Defaults to PNG files under the working directory. */
  readonly imageSource?: ImageSource;
  readonly transformer?: ImageTransformer;
  readonly logger?: PlayerLogger;
}

const ANGLE_EPSILON = 1e-6;

const normalizeAngle = (angle: number): number => ((angle % 360) + 360) % 360;

const needsRotation = (angle: number): boolean =>
  angle > ANGLE_EPSILON && angle < 360 - ANGLE_EPSILON;

/**
 * Frame animation player with per-state frame sequences, three play modes
 * and an LRU cache of processed frames.
 *
 * The host calls {@link FramePlayer.update} once per tick and
 * {@link FramePlayer.draw} to blit the current frame. Call
 * {@link FramePlayer.release} (or use `withFramePlayer`) when done.
 *
 * @example
 * const player = new FramePlayer(
 *   AnimationDefinition.create({
 *     frames: { idle: ['idle-0.png', 'idle-1.png'], walk: ['walk-0.png', 'walk-1.png'] },
 *     durations: { idle: 0.15, walk: 0.1 },
 *   }),
 * );
 * player.setState('walk');
 * player.update(1 / 60);
 * player.draw(surface);
 */
export class FramePlayer implements AnimationPlayer {
  private readonly logger: PlayerLogger;

  private readonly transformer: ImageTransformer;

  private readonly imageSource: ImageSource;

  private readonly state: PlaybackStateManager;

  private readonly cache: FrameCacheManager;

  private transform: FrameTransform;

  private materializedWith: FrameTransform | null = null;

  private displayed: RasterImage | null = null;

  private displayBounds: Bounds | null = null;

  private released = false;

  public constructor(
    private readonly definition: AnimationDefinition,
    injection: FramePlayerInjection = {},
  ) {
    this.logger = injection.logger ?? createChildLogger({ module: 'FramePlayer' });
    this.transformer = injection.transformer ?? new RasterTransformer();
    this.imageSource = injection.imageSource ?? new PngFileImageSource();
    this.transform = { direction: NO_FLIP, scale: definition.frameScale, angle: 0 };

    if (definition.frames.kind === 'named') {
      this.preloadFrames(definition.frames.states);
    }

    this.cache = new FrameCacheManager({
      maxEntries: definition.maxCacheSize,
      process: (frameName, scale, direction) =>
        this.scaleAndFlip(this.imageSource.resolve(frameName), scale, direction),
      createPlaceholder: createPlaceholderImage,
      logger: this.logger,
    });
    this.state = new PlaybackStateManager({
      frameCounts: definition.frameCounts,
      playMode: definition.playMode,
      logger: this.logger,
    });

    const [initialState] = definition.stateNames;
    if (initialState !== undefined) {
      this.state.setState(initialState);
      this.materialize(initialState);
    }
  }

  public get isPlaying(): boolean {
    return this.state.currentState !== null;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  public get frameIndex(): number {
    return this.state.frameIndex;
  }

  public get playMode(): PlayMode {
    return this.state.playMode;
  }

  public get image(): RasterImage | null {
    return this.displayed;
  }

  public get bounds(): Bounds | null {
    return this.displayBounds;
  }

  public get currentTransform(): FrameTransform {
    return this.transform;
  }

  public get cacheInfo(): FrameCacheInfo {
    return this.cache.info();
  }

  public getState(): string | null {
    return this.state.currentState;
  }

  // region cache

  public clearCache(): void {
    this.assertActive();
    this.cache.clear();
  }

  /** Adjusts the cache bound; shrinking evicts the least recently used frames. */
  public setCacheSize(size: number): void {
    this.assertActive();
    this.cache.resize(size);
  }

  // endregion

  // region playback control

  public setState(state: string, resetFrame = true): void {
    this.assertActive();
    const previous = this.state.currentState;
    this.state.setState(state, resetFrame);

    // A state-change observer may have switched state again.
    const current = this.state.currentState;
    if (current !== null && current !== previous) {
      this.materialize(current);
    }
  }

  public rewind(): void {
    this.assertActive();
    this.state.rewind();

    const current = this.state.currentState;
    if (current !== null) {
      this.materialize(current);
    }
  }

  public setPlayMode(mode: string): void {
    this.assertActive();
    this.state.setPlayMode(mode);
  }

  public pause(): void {
    this.assertActive();
    this.state.pause();
  }

  public resume(): void {
    this.assertActive();
    if (this.state.resume()) {
      const current = this.state.currentState;
      if (current !== null) {
        this.materialize(current);
      }
    }
  }

  public addCompleteCallback(callback: CompleteCallback): void {
    this.assertActive();
    this.state.addCompleteCallback(callback);
  }

  public addFrameChangeCallback(callback: FrameChangeCallback): void {
    this.assertActive();
    this.state.addFrameChangeCallback(callback);
  }

  public addStateChangeCallback(callback: StateChangeCallback): void {
    this.assertActive();
    this.state.addStateChangeCallback(callback);
  }

  // endregion

  // region update

  public update(dt: number, transform: Partial<FrameTransform> = {}): void {
    const current = this.state.currentState;
    if (current === null) {
      return;
    }

    if (!this.state.accumulate(dt)) {
      this.logger.warn({ dt }, 'Ignoring invalid time step');
      return;
    }
    this.applyTransform(transform);

    const frameDuration = this.definition.durationOf(current);
    const steps = this.state.advanceIfDue(frameDuration, this.definition.carryRemainder);

    const indexChanged = steps.some((step) => step.index !== step.previousIndex);
    if (indexChanged || this.transformChanged()) {
      this.materialize(current);
    }

    this.dispatchAdvances(steps);
  }

  /** Stops once an observer switches state; the remaining steps describe the old one. */
  private dispatchAdvances(steps: readonly FrameAdvance[]): void {
    const settled = this.state.currentState;
    const unchanged = () => this.state.currentState === settled;

    for (const step of steps) {
      if (step.index !== step.previousIndex && unchanged()) {
        this.state.notifyFrameChange(step.index);
      }
      if (step.completed && unchanged()) {
        this.state.notifyComplete();
      }
      if (!unchanged()) {
        return;
      }
    }
  }

  private applyTransform(transform: Partial<FrameTransform>): void {
    const { direction, scale, angle } = transform;

    if (direction && !sameDirection(direction, this.transform.direction)) {
      this.transform = { ...this.transform, direction: { ...direction } };
    }
    if (scale && !sameScale(scale, this.transform.scale)) {
      this.transform = { ...this.transform, scale: { ...scale } };
    }
    if (angle !== undefined) {
      const normalized = normalizeAngle(angle);
      if (normalized !== this.transform.angle) {
        this.transform = { ...this.transform, angle: normalized };
      }
    }
  }

  private transformChanged(): boolean {
    const last = this.materializedWith;
    return (
      last === null ||
      !sameScale(last.scale, this.transform.scale) ||
      !sameDirection(last.direction, this.transform.direction) ||
      last.angle !== this.transform.angle
    );
  }

  // endregion

  // region materialization

  /**
   * Produces the image for `(state, frameIndex)` under the current transform,
   * bypassing what is on screen. Throws a usage error for an undeclared state
   * or an index outside the state's frames.
   */
  public getFrame(state: string, frameIndex: number): RasterImage {
    this.assertActive();
    return this.renderFrame(state, frameIndex, this.transform);
  }

  private materialize(state: string): void {
    const transform = this.transform;
    const frameIndex = this.state.frameIndex;
    let image: RasterImage;

    try {
      image = this.renderFrame(state, frameIndex, transform);
    } catch (error) {
      this.logger.error({ state, frameIndex, error }, 'Update image failed');
      image = createPlaceholderImage();
    }

    const center = this.displayBounds ? centerOf(this.displayBounds) : null;
    this.displayed = image;
    this.displayBounds = center
      ? boundsAround(center, image)
      : { x: 0, y: 0, width: image.width, height: image.height };
    this.materializedWith = transform;
  }

  private renderFrame(state: string, frameIndex: number, transform: FrameTransform): RasterImage {
    const frames = this.definition.frames;
    let processed: RasterImage;

    switch (frames.kind) {
      case 'direct': {
        const frame = frameAt(frames.states, state, frameIndex);
        processed = this.scaleAndFlip(frame, transform.scale, transform.direction);
        break;
      }
      case 'named': {
        const frameName = frameAt(frames.states, state, frameIndex);
        processed = this.cache.get(frameName, transform.scale, transform.direction);
        break;
      }
      default: {
        const exhaustive: never = frames;
        throw AppError.configuration('animation.unknown-frame-store', 'Unsupported frame store', {
          frames: exhaustive,
        });
      }
    }

    return needsRotation(transform.angle)
      ? this.transformer.rotate(processed, transform.angle)
      : processed;
  }

  /** Scale, then flip. Always returns an image the caller may own. */
  private scaleAndFlip(source: RasterImage, scale: Scale, direction: Direction): RasterImage {
    let image = source;

    if (!isOriginalScale(scale) && !sameScale(scale, image)) {
      image = this.transformer.scale(image, scale);
    }
    if (direction.flipX || direction.flipY) {
      image = this.transformer.flip(image, direction.flipX, direction.flipY);
    }

    return image === source ? cloneRaster(source) : image;
  }

  private preloadFrames(states: ReadonlyMap<string, readonly string[]>): void {
    const seen = new Set<string>();

    for (const [state, names] of states) {
      names.forEach((name, index) => {
        if (seen.has(name)) {
          return;
        }
        seen.add(name);

        try {
          this.imageSource.preload(name);
        } catch (error) {
          throw AppError.configuration(
            'animation.unloadable-frame',
            `frames["${state}"][${index}]: Cannot load image resource "${name}"`,
            { state, index, name },
            error,
          );
        }
      });
    }
  }

  // endregion

  // region drawing

  public draw(surface: DrawSurface): void {
    if (!this.displayed) {
      throw AppError.usage('frame-player.not-ready', 'Image not set');
    }
    if (!this.displayBounds) {
      throw AppError.usage('frame-player.not-ready', 'Bounds not set');
    }

    surface.blit(this.displayed, this.displayBounds);
  }

  /** Moves the display bounds so their center sits at `center`. */
  public setCenter(center: Point): void {
    if (!this.displayBounds) {
      throw AppError.usage('frame-player.not-ready', 'Bounds not set');
    }

    this.displayBounds = boundsAround(center, this.displayBounds);
  }

  public debugLines(): string[] {
    const info = this.cache.info();
    return [
      `State: ${this.state.currentState ?? 'None'}`,
      `Frame: ${this.state.frameIndex}`,
      `Cache: ${info.size}/${info.maxSize}`,
      `PlayMode: ${this.state.playMode}`,
    ];
  }

  // endregion

  // region resources

  /**
   * Releases observers, cached images and the displayed frame.
   * Returns `false` when the player was already released. A failure is logged
   * and re-thrown; the player counts as released either way.
   */
  public release(): boolean {
    if (this.released) {
      this.logger.info('Resource released (skipped safely)');
      return false;
    }

    try {
      this.state.release();
      this.cache.release(this.displayed ? [this.displayed] : []);
      this.displayed = null;
      this.displayBounds = null;
      return true;
    } catch (error) {
      this.logger.error({ error }, 'Resource release failed');
      throw error;
    } finally {
      this.released = true;
      this.logger.debug('Resource release status updated');
    }
  }

  private assertActive(): void {
    if (this.released) {
      throw AppError.usage('frame-player.released', 'The player has been released');
    }
  }

  // endregion
}

function frameAt<TFrame>(
  states: ReadonlyMap<string, readonly TFrame[]>,
  state: string,
  frameIndex: number,
): TFrame {
  const frames = states.get(state);
  if (!frames) {
    throw AppError.usage('frame-player.unknown-state', `Invalid state: ${state}`, { state });
  }

  const frame = Number.isInteger(frameIndex) ? frames[frameIndex] : undefined;
  if (frame === undefined) {
    throw AppError.usage('frame-player.frame-out-of-range', `Index out of range: ${frameIndex}`, {
      state,
      frameIndex,
      frameCount: frames.length,
    });
  }

  return frame;
}
