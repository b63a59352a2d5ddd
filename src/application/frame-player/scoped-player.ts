import type { AnimationPlayer } from '@domain/frame-player/index.js';

/**
 * Runs `work` with the player and releases it on every exit path, including
 * a throw from `work`.
 */
export function withFramePlayer<TPlayer extends AnimationPlayer, TResult>(
  player: TPlayer,
  work: (player: TPlayer) => TResult,
): TResult {
  try {
    return work(player);
  } finally {
    player.release();
  }
}
