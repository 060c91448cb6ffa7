/**
 * Game Engine
 *
 * Lifecycle shared by every game: input routing, per-tick entity updates,
 * pause, victory/defeat detection, teardown, score bookkeeping and reset.
 * Concrete games supply the rules through `step`, `checkVictory`,
 * `checkDefeat`, `onKey` and `setup`.
 */

import { type GameName, MAX_SCORE } from './constants';
import type { SimulationContext } from './context';
import type { CellColor } from './entities';
import type { Position } from './geometry';
import type { GameKey } from './keys';
import { EntityStore, type EntityGroups, type EntityKinds } from './world';

export type GameOutcome = 'victory' | 'defeat';
export type GamePhase = 'running' | 'paused' | GameOutcome;

export interface CellSprite {
  kind: string;
  entityId: number;
  position: Position;
  color: CellColor;
}

export interface GameDetail {
  label: string;
  value: string;
}

export interface GameSnapshot {
  name: GameName;
  phase: GamePhase;
  score: number;
  highestScore: number;
  cells: CellSprite[];
  details: GameDetail[];
  /** Upcoming piece, in offsets from (0,0) */
  preview: Position[];
}

/**
 * What a host needs from a game
 */
export interface ArcadeGame {
  readonly name: GameName;
  readonly paused: boolean;
  readonly outcome: GameOutcome | null;
  handleInput(key: GameKey, isPress: boolean): void;
  tick(counter: number): void;
  isRunning(): boolean;
  currentScore(): number;
  reset(): void;
  snapshot(): GameSnapshot;
}

export abstract class Game<M extends EntityKinds> implements ArcadeGame {
  score = 0;
  highestScore: number;
  paused = false;
  outcome: GameOutcome | null = null;
  protected running = true;
  /** Default action rate for every entity kind */
  protected speed = 1;
  protected readonly entities: EntityStore<M>;

  protected constructor(
    readonly name: GameName,
    protected readonly context: SimulationContext,
    groups: EntityGroups<M>,
  ) {
    this.entities = new EntityStore(groups);
    this.highestScore = context.scores.read(name);
  }

  protected abstract setup(): void;
  protected abstract step(tick: number): void;
  protected abstract onKey(key: GameKey, isPress: boolean): void;
  abstract checkVictory(): boolean;
  abstract checkDefeat(): boolean;

  handleInput(key: GameKey, isPress: boolean): void {
    if (isPress && key === 'pause') {
      if (this.running) this.paused = !this.paused;
      return;
    }
    if (isPress && key === 'confirm') {
      this.reset();
      return;
    }
    if (this.running && !this.paused) this.onKey(key, isPress);
  }

  tick(counter: number): void {
    this.updateEntities(counter);
    this.manage(counter);
  }

  updateEntities(tick: number): void {
    if (this.paused) return;
    for (const [kind, list] of this.entities.entries()) {
      const rate = this.rateOf(kind);
      for (const entity of [...list]) entity.update(tick, rate);
    }
  }

  manage(tick: number): void {
    if (!this.running || this.paused) return;
    this.step(tick);
    if (this.checkVictory()) {
      this.finish('victory');
    } else if (this.checkDefeat()) {
      this.finish('defeat');
    }
  }

  /** Action rate for entities of `kind` */
  rateOf(_kind: Extract<keyof M, string>): number {
    return this.speed;
  }

  updateScore(): void {
    if (this.score <= this.highestScore) return;
    this.score = Math.min(this.score, MAX_SCORE);
    this.highestScore = this.score;
    this.context.scores.write(this.name, this.highestScore);
  }

  reset(): void {
    this.teardown();
    this.running = true;
    this.paused = false;
    this.outcome = null;
    this.score = 0;
    this.setup();
  }

  /** Empties every collection and forgets this game's bombs */
  teardown(): void {
    for (const [, list] of this.entities.entries()) {
      this.context.bombs.release(list);
    }
    this.entities.clear();
  }

  isRunning(): boolean {
    return this.running;
  }

  currentScore(): number {
    return this.score;
  }

  get phase(): GamePhase {
    if (this.outcome) return this.outcome;
    return this.paused ? 'paused' : 'running';
  }

  snapshot(): GameSnapshot {
    const cells: CellSprite[] = [];
    for (const [kind, list] of this.entities.entries()) {
      for (const entity of list) {
        for (const sprite of entity.sprites()) cells.push({ kind, ...sprite });
      }
    }
    return {
      name: this.name,
      phase: this.phase,
      score: this.score,
      highestScore: this.highestScore,
      cells,
      details: this.details(),
      preview: this.preview(),
    };
  }

  protected details(): GameDetail[] {
    return [];
  }

  protected preview(): Position[] {
    return [];
  }

  private finish(outcome: GameOutcome): void {
    this.teardown();
    this.running = false;
    this.outcome = outcome;
    this.updateScore();
    console.info(`[${this.name}] ${outcome === 'victory' ? 'Victory' : 'Defeat'} with score ${this.score}`);
  }
}
