/**
 * Tick Scheduler
 *
 * One monotonically increasing counter drives every periodic action.
 * An action running `rate` times per second fires on tick `t` when
 * `t % round(TICKS_PER_SECOND / rate) === 0`, so independent cadences
 * (movement, shooting, spawning, speed-ups) compose without timers.
 */

import { TICKS_PER_SECOND } from './constants';

/**
 * Number of ticks between two firings of an action at `rate` per second
 */
export function actionDivisor(rate: number): number {
  return Math.max(1, Math.round(TICKS_PER_SECOND / rate));
}

/**
 * Whether an action at `rate` per second fires on `tick`
 */
export function isActionTick(tick: number, rate: number): boolean {
  if (!(rate > 0)) return false;
  return tick % actionDivisor(rate) === 0;
}

export class TickScheduler {
  private counter = 0;

  get tick(): number {
    return this.counter;
  }

  /** Advance one frame and return the new tick */
  advance(): number {
    this.counter += 1;
    return this.counter;
  }

  reset(): void {
    this.counter = 0;
  }
}
