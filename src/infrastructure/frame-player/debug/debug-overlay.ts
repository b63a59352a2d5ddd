import type { Point } from '@domain/frame-player/index.js';
import type { SKRSContext2D } from '@napi-rs/canvas';

import { PLAYER_DEFAULTS } from '@/shared/config/player-defaults.js';

import type { FramePlayer } from '../frame-player.js';

export function renderDebugOverlay(context: SKRSContext2D, player: FramePlayer, position: Point): void {
  const lineHeight = PLAYER_DEFAULTS.debugFontSize;

  context.save();
  context.font = `${PLAYER_DEFAULTS.debugFontSize}px sans-serif`;
  context.fillStyle = '#ffffff';
  context.textBaseline = 'top';

  player.debugLines().forEach((line, index) => {
    context.fillText(line, position.x, position.y + index * lineHeight);
  });

  context.restore();
}
