import { PLAY_MODES } from '@domain/frame-player/index.js';
import { z } from 'zod';

import { PLAYER_DEFAULTS } from '@/shared/config/player-defaults.js';

export const rasterImageSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    data: z.instanceof(Uint8ClampedArray),
  })
  .refine((image) => image.data.length === image.width * image.height * 4, {
    message: 'data must hold width * height * 4 bytes',
  });

export const frameReferenceSchema = z.union([z.string().min(1), rasterImageSchema]);

export const frameScaleSchema = z.object({
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

export const animationConfigSchema = z.object({
  frames: z.record(z.string().min(1), z.array(frameReferenceSchema).min(1)),
  /** One duration for every state, or one per state. */
  durations: z.union([
    z.number().positive(),
    z.record(z.string().min(1), z.number().positive()),
  ]),
  frameScale: frameScaleSchema.optional(),
  maxCacheSize: z.number().int().min(PLAYER_DEFAULTS.minCacheSize).optional(),
  playMode: z.enum(PLAY_MODES).optional(),
  carryRemainder: z.boolean().optional(),
});

export type AnimationConfigPayload = z.input<typeof animationConfigSchema>;

export type ValidatedAnimationConfig = z.output<typeof animationConfigSchema>;
