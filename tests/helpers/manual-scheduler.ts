/**
 * Scheduler whose clock only moves when something sleeps. Every sleep
 * returns at once after advancing the clock by its duration, so polling
 * loops run to completion with exact, repeatable timings.
 */

import type { Scheduler } from '../../src/utils/scheduler';
import { abortReason } from '../../src/utils/scheduler';

export class ManualScheduler implements Scheduler {
  readonly sleeps: number[] = [];
  private time: number;

  constructor(start = 0) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  async sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
    if (abortSignal?.aborted) {
      throw abortReason(abortSignal);
    }
    this.sleeps.push(ms);
    this.time += ms;
  }
}
