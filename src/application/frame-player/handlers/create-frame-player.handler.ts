import { AnimationDefinition } from '@domain/frame-player/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { FramePlayer, type FramePlayerInjection } from '@/infrastructure/frame-player/index.js';

import type { CreateFramePlayerCommand } from '../commands/create-frame-player.command.js';
import {
  animationConfigSchema,
  type AnimationConfigPayload,
  type ValidatedAnimationConfig,
} from '../dto/animation-config.dto.js';

export class CreateFramePlayerHandler {
  private readonly logger = createChildLogger({ module: 'CreateFramePlayerHandler' });

  public constructor(private readonly injection: FramePlayerInjection = {}) {}

  public execute(command: CreateFramePlayerCommand): FramePlayer {
    const payload = this.validate(command.payload);
    const { durations } = payload;
    const stateNames = Object.keys(payload.frames);

    try {
      const definition = AnimationDefinition.create({
        ...payload,
        durations:
          typeof durations === 'number'
            ? Object.fromEntries(stateNames.map((state) => [state, durations]))
            : durations,
      });

      const player = new FramePlayer(definition, this.injection);

      this.logger.info(
        {
          states: definition.stateNames,
          frameKind: definition.frames.kind,
          playMode: definition.playMode,
          maxCacheSize: definition.maxCacheSize,
        },
        'Frame player created',
      );

      return player;
    } catch (error) {
      this.logger.error({ states: stateNames, error }, 'Frame player creation failed');
      throw AppError.fromUnknown(error, 'frame-player.create-failed');
    }
  }

  private validate(payload: AnimationConfigPayload): ValidatedAnimationConfig {
    const parsed = animationConfigSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('frame-player.invalid-config', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid animation config received');
      throw error;
    }

    return parsed.data;
  }
}
