/**
 * Unit tests for PaneLockManager
 */

import { describe, it, expect } from 'vitest';
import { PaneLockManager } from '@core/pane-lock';
import { parsePaneAddress } from '@core/target-resolver';
import { ConcurrentDispatchViolationError } from '../../src/types/error.types';

const pane = parsePaneAddress('dev:main.1');
const otherPane = parsePaneAddress('dev:main.2');

describe('PaneLockManager', () => {
  describe('serialize policy', () => {
    it('should grant the lock to one owner at a time in FIFO order', async () => {
      const locks = new PaneLockManager('serialize');
      const order: string[] = [];

      const first = await locks.acquire(pane, 'first');
      const second = locks.acquire(pane, 'second').then((lease) => {
        order.push('second');
        return lease;
      });
      const third = locks.acquire(pane, 'third').then((lease) => {
        order.push('third');
        return lease;
      });

      await Promise.resolve();
      expect(locks.getHolder(pane)).toBe('first');
      expect(order).toEqual([]);

      first.release();
      const secondLease = await second;
      expect(locks.getHolder(pane)).toBe('second');

      secondLease.release();
      const thirdLease = await third;
      expect(order).toEqual(['second', 'third']);

      thirdLease.release();
      expect(locks.isLocked(pane)).toBe(false);
    });

    it('should not block other panes', async () => {
      const locks = new PaneLockManager();
      await locks.acquire(pane, 'a');
      const lease = await locks.acquire(otherPane, 'b');

      expect(lease.owner).toBe('b');
      expect(locks.isLocked(pane)).toBe(true);
      expect(locks.isLocked(otherPane)).toBe(true);
    });

    it('should treat release as idempotent', async () => {
      const locks = new PaneLockManager();
      const first = await locks.acquire(pane, 'first');
      first.release();
      first.release();

      const second = await locks.acquire(pane, 'second');
      const third = locks.acquire(pane, 'third');
      first.release();

      await Promise.resolve();
      expect(locks.getHolder(pane)).toBe('second');
      second.release();
      expect((await third).owner).toBe('third');
    });
  });

  describe('reject policy', () => {
    it('should reject a second owner while the pane is held', async () => {
      const locks = new PaneLockManager('reject');
      const lease = await locks.acquire(pane, 'first');

      const error = await locks.acquire(pane, 'second').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConcurrentDispatchViolationError);
      expect(error).toHaveProperty('heldBy', 'first');
      expect(error).toHaveProperty('attemptedBy', 'second');

      lease.release();
      expect((await locks.acquire(pane, 'third')).owner).toBe('third');
    });
  });
});
