/**
 * Unit tests for CompletionSynchronizer
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { chainCommand, CompletionSynchronizer, isIncompleteCommand } from '@core/completion-synchronizer';
import { busyMarker } from '@core/idle-state';
import { OutputObserver } from '@core/output-observer';
import { SignalRegistry } from '@core/signal-registry';
import { parsePaneAddress } from '@core/target-resolver';
import {
  InjectionError,
  OrchestrationError,
  PollExhaustedError,
  SignalReuseError,
  SignalTimeoutError,
  TargetUnavailableError,
  WaitCancelledError,
} from '../../src/types/error.types';
import { systemScheduler } from '../../src/utils/scheduler';
import { FakeMultiplexer } from '../helpers/fake-multiplexer';
import { ManualScheduler } from '../helpers/manual-scheduler';

const target = parsePaneAddress('session-A:main.1');

describe('chainCommand', () => {
  it('should run the suffix after the command', () => {
    expect(chainCommand("run 'x'", 'emit s')).toBe("run 'x'; emit s");
  });

  it('should drop trailing separators and whitespace', () => {
    expect(chainCommand('make test ;  ', 'emit s')).toBe('make test; emit s');
  });

  it('should not add a separator after a background job', () => {
    expect(chainCommand('sleep 5 &', 'emit s')).toBe('sleep 5 & emit s');
  });

  it('should return the suffix alone for an empty command', () => {
    expect(chainCommand('  ', 'emit s')).toBe('emit s');
  });

  it('should refuse commands that end with a dangling operator', () => {
    for (const command of ['make &&', 'make ||', 'make |', 'make |&', 'make && ;', 'make \\']) {
      expect(() => chainCommand(command, 'emit s'), command).toThrow(RangeError);
    }
  });
});

describe('isIncompleteCommand', () => {
  it('should flag dangling operators but not complete commands', () => {
    expect(isIncompleteCommand('make test &&')).toBe(true);
    expect(isIncompleteCommand('ls |  ')).toBe(true);
    expect(isIncompleteCommand('make test && echo ok')).toBe(false);
    expect(isIncompleteCommand('sleep 5 &')).toBe(false);
    expect(isIncompleteCommand('')).toBe(false);
  });
});

describe('CompletionSynchronizer', () => {
  let backend: FakeMultiplexer;
  let signals: SignalRegistry;

  beforeEach(() => {
    backend = new FakeMultiplexer();
    backend.addPane(target);
    signals = new SignalRegistry();
  });

  describe('signal wait', () => {
    let sync: CompletionSynchronizer;

    beforeEach(() => {
      sync = new CompletionSynchronizer(backend, new OutputObserver(backend), signals, systemScheduler);
    });

    it('should build the control suffix from the backend emitter', () => {
      const signal = sync.arm(target, { name: 'done' });
      expect(sync.signalSuffix(signal)).toBe('; emit done');
    });

    it('should chain the backend emitter onto a command', () => {
      const signal = sync.arm(target, { name: 'done' });
      expect(sync.withSignal('echo hi', signal)).toBe('echo hi; emit done');
    });

    it('should refuse to chain the signal after a dangling operator', () => {
      const signal = sync.arm(target, { name: 'done' });

      const error = (() => {
        try {
          sync.withSignal('make test &&', signal);
          return undefined;
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(InjectionError);
      expect(error).toHaveProperty('reason', 'incomplete-command');
      expect(error).toHaveProperty('target', 'session-A:main.1');
    });

    it('should return once the signal fires within the timeout', async () => {
      vi.useFakeTimers();
      const signal = sync.arm(target, { name: 'done' });
      setTimeout(() => backend.runInPane(target, 'emit done'), 1500);

      const waiting = sync.waitForSignal(signal, { timeoutMs: 2000 });
      await vi.advanceTimersByTimeAsync(1500);
      const result = await waiting;

      expect(result.signal).toBe(signal);
      expect(result.waitedMs).toBe(1500);
      expect(signals.state(signal)).toBe('signaled');
    });

    it('should time out when the signal comes too late', async () => {
      vi.useFakeTimers();
      const signal = sync.arm(target, { name: 'done' });
      setTimeout(() => backend.runInPane(target, 'emit done'), 2500);

      const waiting = sync.waitForSignal(signal, { timeoutMs: 2000 }).catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(2000);
      const error = await waiting;

      expect(error).toBeInstanceOf(SignalTimeoutError);
      expect(error).toHaveProperty('recoverable', true);
      expect(error).toHaveProperty('timeoutMs', 2000);
      expect(error).toHaveProperty('target', 'session-A:main.1');
      expect(backend.waiterCount('done')).toBe(0);
      expect(signals.state(signal)).toBeUndefined();
    });

    it('should resolve at once when the signal fired before the wait began', async () => {
      const signal = sync.arm(target, { name: 'done' });
      backend.runInPane(target, 'echo fast && emit done');

      const result = await sync.waitForSignal(signal);

      expect(result.signal.name).toBe('done');
    });

    it('should stop waiting on cancellation without touching the pane', async () => {
      const signal = sync.arm(target);
      const controller = new AbortController();

      const waiting = sync.waitForSignal(signal, { abortSignal: controller.signal }).catch((e: unknown) => e);
      controller.abort();
      const error = await waiting;

      expect(error).toBeInstanceOf(WaitCancelledError);
      expect(error).toHaveProperty('operation', 'wait-signal');
      expect(backend.waiterCount(signal.name)).toBe(0);
      expect(backend.injections).toEqual([]);
    });

    it('should refuse to start when already cancelled', async () => {
      const signal = sync.arm(target);
      const controller = new AbortController();
      controller.abort();

      await expect(sync.waitForSignal(signal, { abortSignal: controller.signal })).rejects.toBeInstanceOf(
        WaitCancelledError
      );
      expect(signals.state(signal)).toBeUndefined();
    });

    it('should refuse to wait twice on a consumed signal', async () => {
      const signal = sync.arm(target, { name: 'done' });
      backend.runInPane(target, 'emit done');
      await sync.waitForSignal(signal);

      await expect(sync.waitForSignal(signal)).rejects.toBeInstanceOf(SignalReuseError);
    });

    it('should collapse duplicate emissions into one completion', async () => {
      const signal = sync.arm(target, { name: 'done' });
      backend.runInPane(target, 'emit done; emit done');

      await sync.waitForSignal(signal);

      expect(backend.emitted).toEqual(['done', 'done']);
      expect(signals.outstanding()).toEqual([]);
    });

    it('should wrap backend failures', async () => {
      const signal = sync.arm(target);
      backend.failNext('waitSignal', new Error('server exited'));

      const error = await sync.waitForSignal(signal).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OrchestrationError);
      expect(error).not.toBeInstanceOf(WaitCancelledError);
      expect(error).toHaveProperty('operation', 'wait-signal');
      expect(signals.state(signal)).toBeUndefined();
    });
  });

  describe('idle poll', () => {
    let scheduler: ManualScheduler;
    let sync: CompletionSynchronizer;

    beforeEach(() => {
      scheduler = new ManualScheduler();
      sync = new CompletionSynchronizer(backend, new OutputObserver(backend), signals, scheduler, {
        pollIntervalMs: 100,
        quietSamplesRequired: 2,
        maxPollSamples: 150,
        captureLines: 10,
      });
    });

    it('should wait for two consecutive quiet samples', async () => {
      backend.pane(target).frames = [['BUSY'], ['BUSY'], ['done'], ['BUSY'], ['done'], ['done']];

      const result = await sync.pollUntilIdle(target, { isBusy: busyMarker('BUSY') });

      expect(result.samples).toBe(6);
      expect(result.elapsedMs).toBe(500);
      expect(result.snapshot.lines).toEqual(['done']);
      expect(scheduler.sleeps).toEqual([100, 100, 100, 100, 100]);
    });

    it('should honour a custom interval and debounce length', async () => {
      backend.pane(target).frames = [['done']];

      const result = await sync.pollUntilIdle(target, {
        isBusy: busyMarker('BUSY'),
        intervalMs: 250,
        quietSamplesRequired: 1,
      });

      expect(result.samples).toBe(1);
      expect(result.elapsedMs).toBe(0);
      expect(scheduler.sleeps).toEqual([]);
    });

    it('should give up after the sample budget with the last snapshot', async () => {
      backend.pane(target).frames = [['BUSY']];

      const error = await sync
        .pollUntilIdle(target, { isBusy: busyMarker('BUSY'), maxSamples: 3 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PollExhaustedError);
      expect(error).toHaveProperty('samples', 3);
      expect(error).toHaveProperty('elapsedMs', 200);
      expect(error).toHaveProperty('recoverable', true);
      expect(error).toHaveProperty('lastSnapshot.lines', ['BUSY']);
    });

    it('should give up after the wall-clock budget', async () => {
      backend.pane(target).frames = [['BUSY']];

      const error = await sync
        .pollUntilIdle(target, { isBusy: busyMarker('BUSY'), maxWaitMs: 250 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PollExhaustedError);
      expect(error).toHaveProperty('samples', 4);
      expect(error).toHaveProperty('elapsedMs', 300);
    });

    it('should stop polling when cancelled', async () => {
      backend.pane(target).frames = [['BUSY']];
      const controller = new AbortController();
      let calls = 0;

      const error = await sync
        .pollUntilIdle(target, {
          isBusy: () => {
            calls++;
            if (calls === 3) {
              controller.abort();
            }
            return true;
          },
          abortSignal: controller.signal,
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WaitCancelledError);
      expect(error).toHaveProperty('operation', 'poll-idle');
      expect(calls).toBe(3);
      expect(scheduler.sleeps).toEqual([100, 100]);
    });

    it('should fail when the pane disappears', async () => {
      backend.removePane(target);

      await expect(sync.pollUntilIdle(target, { isBusy: () => false })).rejects.toBeInstanceOf(
        TargetUnavailableError
      );
    });
  });
});
