/**
 * Simulation Context
 *
 * Shared state handed to every game instead of module-level globals:
 * the bomb registry, the high-score store, the random source and the
 * entity id sequence.
 */

import { BombRegistry } from './bomb';
import type { IdSequence } from './entities';
import { MemoryScoreStore, type ScoreStore } from './scores';

export type RandomSource = () => number;

export interface SimulationContextOptions {
  scores?: ScoreStore;
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: RandomSource;
}

export class SimulationContext implements IdSequence {
  readonly bombs = new BombRegistry();
  readonly scores: ScoreStore;
  readonly random: RandomSource;
  private lastId = 0;

  constructor(options: SimulationContextOptions = {}) {
    this.scores = options.scores ?? new MemoryScoreStore();
    this.random = options.random ?? Math.random;
  }

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  /** Uniform integer in [min, max] */
  randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  chance(probability: number): boolean {
    return this.random() < probability;
  }

  pick<T>(items: readonly T[]): T {
    return items[this.randomInt(0, items.length - 1)];
  }
}
