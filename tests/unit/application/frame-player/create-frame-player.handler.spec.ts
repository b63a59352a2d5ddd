import type { AnimationPlayer } from '@domain/frame-player/index.js';
import { describe, expect, it, vi } from 'vitest';

import {
  createFramePlayer,
  CreateFramePlayerCommand,
  CreateFramePlayerHandler,
  withFramePlayer,
} from '@/application/frame-player/index.js';
import { MapImageSource } from '@/infrastructure/frame-player/index.js';

import { captureError, createLoggerStub, GREEN, RED, solidFrame } from '../../../support/fixtures.js';

describe('CreateFramePlayerHandler', () => {
  it('applies a single duration to every state', () => {
    const player = createFramePlayer(
      {
        frames: { idle: [solidFrame(RED), solidFrame(GREEN)], walk: [solidFrame(GREEN)] },
        durations: 0.5,
      },
      { logger: createLoggerStub() },
    );

    player.update(0.5);
    expect(player.frameIndex).toBe(1);

    player.setState('walk');
    player.update(0.5);
    expect(player.frameIndex).toBe(0);
    expect(player.getState()).toBe('walk');
  });

  it('builds named players against the injected image source', () => {
    const handler = new CreateFramePlayerHandler({
      logger: createLoggerStub(),
      imageSource: new MapImageSource({ 'idle-0': solidFrame(RED) }),
    });

    const player = handler.execute(
      new CreateFramePlayerCommand({
        frames: { idle: ['idle-0'] },
        durations: { idle: 0.1 },
        frameScale: { width: 4, height: 4 },
        playMode: 'once',
      }),
    );

    expect(player.playMode).toBe('once');
    expect(player.image?.width).toBe(4);
    expect(player.cacheInfo.size).toBe(1);
  });

  it('rejects payloads that fail validation', () => {
    const error = captureError(() =>
      createFramePlayer({ frames: { idle: [] }, durations: 0.1 }, { logger: createLoggerStub() }),
    );

    expect(error).toMatchObject({ code: 'frame-player.invalid-config', category: 'configuration' });
  });

  it('surfaces definition errors unchanged', () => {
    const error = captureError(() =>
      createFramePlayer(
        { frames: { idle: [solidFrame(RED)], walk: [solidFrame(RED)] }, durations: { idle: 0.1, run: 0.1 } },
        { logger: createLoggerStub() },
      ),
    );

    expect(error).toMatchObject({
      code: 'animation.state-mismatch',
      category: 'configuration',
      message: 'States definition incomplete, missing: run, walk',
    });
  });
});

describe('withFramePlayer', () => {
  const createPlayer = () =>
    createFramePlayer({ frames: { idle: [solidFrame(RED)] }, durations: 0.1 }, { logger: createLoggerStub() });

  it('returns the result of the work and releases the player', () => {
    const player = createPlayer();

    const state = withFramePlayer(player, (active) => active.getState());

    expect(state).toBe('idle');
    expect(player.isReleased).toBe(true);
  });

  it('releases the player when the work throws', () => {
    const player = createPlayer();

    expect(() =>
      withFramePlayer(player, () => {
        throw new Error('work failed');
      }),
    ).toThrow('work failed');
    expect(player.isReleased).toBe(true);
  });

  it('accepts any animation player', () => {
    const release = vi.fn(() => true);
    const player: AnimationPlayer = {
      update: vi.fn(),
      setState: vi.fn(),
      draw: vi.fn(),
      addCompleteCallback: vi.fn(),
      addFrameChangeCallback: vi.fn(),
      addStateChangeCallback: vi.fn(),
      release,
      isPlaying: true,
    };

    withFramePlayer(player, () => undefined);

    expect(release).toHaveBeenCalledTimes(1);
  });
});
