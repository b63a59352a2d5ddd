import type { Direction, PlayerLogger, RasterImage, Scale } from '@domain/frame-player/index.js';
import { LRUCache } from 'lru-cache';

import { PLAYER_DEFAULTS } from '@/shared/config/player-defaults.js';
import { AppError } from '@/shared/errors/app-error.js';

export type ProcessFrame = (frameName: string, scale: Scale, direction: Direction) => RasterImage;

export interface FrameCacheOptions {
  readonly maxEntries: number;
  /** Resolves the raw image and applies scale and flip. Runs on every miss. */
  readonly process: ProcessFrame;
  readonly createPlaceholder: () => RasterImage;
  readonly logger: PlayerLogger;
}

export interface FrameCacheInfo {
  readonly size: number;
  readonly maxSize: number;
  /** Up to three keys, least recently used first. */
  readonly sampleKeys: string[];
}

export function frameCacheKey(frameName: string, scale: Scale, direction: Direction): string {
  return JSON.stringify([frameName, scale.width, scale.height, direction.flipX, direction.flipY]);
}

/**
 * Bounded store of processed frames keyed by (frame name, scale, flip).
 *
 * A miss processes the frame completely before touching the store, so a
 * `process` callback that re-enters the cache never observes a half-done
 * insertion.
 */
export class FrameCacheManager {
  private store: LRUCache<string, RasterImage>;

  private readonly options: FrameCacheOptions;

  public constructor(options: FrameCacheOptions) {
    assertCacheSize(options.maxEntries);
    this.options = options;
    this.store = new LRUCache({ max: options.maxEntries });
  }

  public get maxSize(): number {
    return this.store.max;
  }

  public get size(): number {
    return this.store.size;
  }

  /**
   * Returns the processed frame, processing and caching it on a miss. A failed
   * miss yields the placeholder, which is not cached so the next call retries.
   */
  public get(frameName: string, scale: Scale, direction: Direction): RasterImage {
    const key = frameCacheKey(frameName, scale, direction);

    const cached = this.store.get(key);
    if (cached) {
      return cached;
    }

    let processed: RasterImage;
    try {
      processed = this.options.process(frameName, scale, direction);
    } catch (error) {
      this.options.logger.error({ frameName, key, error }, 'Image processing failed');
      return this.options.createPlaceholder();
    }

    this.store.set(key, processed);
    this.options.logger.debug({ key }, 'Cached new image');

    return processed;
  }

  /** Membership test that leaves recency untouched. */
  public has(frameName: string, scale: Scale, direction: Direction): boolean {
    const key = frameCacheKey(frameName, scale, direction);
    return this.store.has(key);
  }

  public resize(maxEntries: number): void {
    assertCacheSize(maxEntries);

    const resized = new LRUCache<string, RasterImage>({ max: maxEntries });
    // Oldest first, so the most recent entries survive a shrink.
    for (const [key, value] of this.store.rentries()) {
      resized.set(key, value);
    }
    this.store = resized;
  }

  public clear(): void {
    this.store.clear();
    this.options.logger.info('Cache cleared');
  }

  /**
   * Zeroes the pixels of every cached image and of `extra`, then clears the
   * cache. A failure to scrub one image is logged and does not stop the rest.
   */
  public release(extra: readonly RasterImage[] = []): void {
    const images = new Set<RasterImage>([...extra, ...this.store.values()]);
    for (const image of images) {
      try {
        image.data.fill(0);
      } catch (error) {
        this.options.logger.warn({ error }, 'Failed to scrub image');
      }
    }
    this.clear();
  }

  public info(): FrameCacheInfo {
    return {
      size: this.store.size,
      maxSize: this.store.max,
      sampleKeys: [...this.store.rkeys()].slice(0, PLAYER_DEFAULTS.sampleKeyCount),
    };
  }
}

function assertCacheSize(size: number): void {
  if (!Number.isInteger(size) || size < PLAYER_DEFAULTS.minCacheSize) {
    throw AppError.configuration(
      'frame-cache.size-below-minimum',
      `Cache size must be an integer greater than or equal to ${PLAYER_DEFAULTS.minCacheSize}`,
      { size },
    );
  }
}
