import type { CompleteCallback, PlayMode } from '@domain/frame-player/index.js';
import { PlaybackStateManager } from '@domain/frame-player/index.js';
import { describe, expect, it, vi } from 'vitest';

import { AppError } from '@/shared/errors/app-error.js';

import { captureError, createLoggerStub } from '../../../support/fixtures.js';

function createManager(playMode: PlayMode = 'loop') {
  const logger = createLoggerStub();
  const manager = new PlaybackStateManager({
    frameCounts: new Map([
      ['idle', 3],
      ['walk', 4],
      ['single', 1],
    ]),
    playMode,
    logger,
  });
  return { manager, logger };
}

function advanceTimes(manager: PlaybackStateManager, times: number) {
  return Array.from({ length: times }, () => manager.advance());
}

describe('PlaybackStateManager', () => {
  describe('setState', () => {
    it('rejects undeclared states with a usage error', () => {
      const { manager } = createManager();

      const caught = captureError(() => manager.setState('run'));

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({ code: 'frame-player.unknown-state', category: 'usage' });
    });

    it('fires state-change only when the state actually changes', () => {
      const { manager } = createManager();
      const onStateChange = vi.fn();
      manager.addStateChangeCallback(onStateChange);

      manager.setState('idle');
      manager.setState('idle');
      manager.setState('walk');

      expect(onStateChange.mock.calls).toEqual([['idle'], ['walk']]);
    });

    it('keeps the frame index without reset, clamped to the new state', () => {
      const { manager } = createManager();
      manager.setState('walk');
      advanceTimes(manager, 3);

      manager.setState('idle', false);

      expect(manager.currentState).toBe('idle');
      expect(manager.frameIndex).toBe(2);
    });

    it('resets the index and elapsed time by default', () => {
      const { manager } = createManager();
      manager.setState('walk');
      advanceTimes(manager, 2);
      manager.accumulate(0.05);

      manager.setState('idle');

      expect(manager.frameIndex).toBe(0);
      expect(manager.timeSinceLastFrame).toBe(0);
    });
  });

  describe('advance', () => {
    it('wraps around in loop mode and never completes', () => {
      const { manager } = createManager('loop');
      manager.setState('idle');

      const steps = advanceTimes(manager, 3);

      expect(steps.map((step) => step.index)).toEqual([1, 2, 0]);
      expect(steps.some((step) => step.completed)).toBe(false);
    });

    it('clamps at the last frame in once mode, completes and pauses', () => {
      const { manager } = createManager('once');
      manager.setState('idle');

      const steps = advanceTimes(manager, 3);

      expect(steps).toEqual([
        { previousIndex: 0, index: 1, completed: false },
        { previousIndex: 1, index: 2, completed: false },
        { previousIndex: 2, index: 2, completed: true },
      ]);
      expect(manager.currentState).toBeNull();
    });

    it('reflects at both ends in pingpong mode', () => {
      const { manager } = createManager('pingpong');
      manager.setState('walk');

      const steps = advanceTimes(manager, 8);

      expect(steps.map((step) => step.index)).toEqual([1, 2, 3, 2, 1, 0, 1, 2]);
      expect(steps.filter((step) => step.completed).map((step) => step.previousIndex)).toEqual([3, 0]);
    });

    it('keeps a single-frame state on its frame while reporting the reflection', () => {
      const { manager } = createManager('pingpong');
      manager.setState('single');

      expect(manager.advance()).toEqual({ previousIndex: 0, index: 0, completed: true });
    });
  });

  describe('advanceIfDue', () => {
    it('crosses one boundary and drops the remainder by default', () => {
      const { manager } = createManager();
      manager.setState('idle');
      manager.accumulate(0.35);

      const steps = manager.advanceIfDue(0.1);

      expect(steps).toHaveLength(1);
      expect(manager.frameIndex).toBe(1);
      expect(manager.timeSinceLastFrame).toBe(0);
    });

    it.each([Number.NaN, Number.POSITIVE_INFINITY, -0.1])('ignores a time step of %s', (dt) => {
      const { manager } = createManager();
      manager.setState('idle');

      expect(manager.accumulate(dt)).toBe(false);
      expect(manager.timeSinceLastFrame).toBe(0);

      manager.accumulate(0.1);
      expect(manager.advanceIfDue(0.1)).toHaveLength(1);
    });

    it('crosses every elapsed boundary when carrying the remainder', () => {
      const { manager } = createManager();
      manager.setState('idle');
      manager.accumulate(0.5);

      const steps = manager.advanceIfDue(0.25, true);

      expect(steps.map((step) => step.index)).toEqual([1, 2]);
      expect(manager.timeSinceLastFrame).toBe(0);
    });

    it('does nothing before the duration is reached', () => {
      const { manager } = createManager();
      manager.setState('idle');
      manager.accumulate(0.05);

      expect(manager.advanceIfDue(0.1)).toEqual([]);
      expect(manager.timeSinceLastFrame).toBe(0.05);
    });
  });

  describe('pause and resume', () => {
    it('resumes the state that was active when paused', () => {
      const { manager } = createManager();
      manager.setState('walk');
      advanceTimes(manager, 1);

      manager.pause();
      expect(manager.currentState).toBeNull();
      expect(manager.frameIndex).toBe(1);

      expect(manager.resume()).toBe(true);
      expect(manager.currentState).toBe('walk');
      expect(manager.frameIndex).toBe(1);
    });

    it('falls back to the first declared state', () => {
      const { manager } = createManager();

      expect(manager.resume()).toBe(true);
      expect(manager.currentState).toBe('idle');
    });

    it('is a no-op while playing', () => {
      const { manager } = createManager();
      manager.setState('walk');

      expect(manager.resume()).toBe(false);
      expect(manager.currentState).toBe('walk');
    });
  });

  it('rewinds the index and elapsed time without changing state', () => {
    const { manager } = createManager();
    manager.setState('walk');
    advanceTimes(manager, 2);
    manager.accumulate(0.07);

    manager.rewind();

    expect(manager.currentState).toBe('walk');
    expect(manager.frameIndex).toBe(0);
    expect(manager.timeSinceLastFrame).toBe(0);
  });

  it('rejects unknown play modes with a configuration error', () => {
    const { manager } = createManager();

    expect(captureError(() => manager.setPlayMode('reverse'))).toMatchObject({
      code: 'frame-player.invalid-play-mode',
      category: 'configuration',
    });
    manager.setPlayMode('once');
    expect(manager.playMode).toBe('once');
  });

  describe('callbacks', () => {
    it('keeps dispatching when an observer throws', () => {
      const { manager, logger } = createManager();
      const first = vi.fn();
      const failing = vi.fn(() => {
        throw new Error('observer failed');
      });
      const third = vi.fn();
      manager.addFrameChangeCallback(first);
      manager.addFrameChangeCallback(failing);
      manager.addFrameChangeCallback(third);

      const report = manager.notifyFrameChange(2);

      expect(first).toHaveBeenCalledWith(2);
      expect(third).toHaveBeenCalledWith(2);
      expect(report.invoked).toBe(3);
      expect(report.failures.map((failure) => failure.observerIndex)).toEqual([1]);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('ignores non-callable observers with a warning', () => {
      const { manager, logger } = createManager();
      const notCallable: unknown = 'not a function';

      expect(manager.addCompleteCallback(notCallable as CompleteCallback)).toBe(false);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(manager.notifyComplete().invoked).toBe(0);
    });

    it('drops every observer on release', () => {
      const { manager } = createManager();
      const onComplete = vi.fn();
      manager.setState('idle');
      manager.addCompleteCallback(onComplete);

      manager.release();

      expect(manager.currentState).toBeNull();
      expect(manager.notifyComplete().invoked).toBe(0);
      expect(onComplete).not.toHaveBeenCalled();
    });
  });
});
