import type { FramePlayer, FramePlayerInjection } from '@/infrastructure/frame-player/index.js';

import { CreateFramePlayerCommand } from './commands/create-frame-player.command.js';
import type { AnimationConfigPayload } from './dto/animation-config.dto.js';
import { CreateFramePlayerHandler } from './handlers/create-frame-player.handler.js';

export * from './commands/create-frame-player.command.js';
export * from './dto/animation-config.dto.js';
export * from './handlers/create-frame-player.handler.js';
export * from './scoped-player.js';

export function createFramePlayer(
  payload: AnimationConfigPayload,
  injection: FramePlayerInjection = {},
): FramePlayer {
  return new CreateFramePlayerHandler(injection).execute(new CreateFramePlayerCommand(payload));
}
