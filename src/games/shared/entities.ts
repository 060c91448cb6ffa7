/**
 * Grid entities
 *
 * A closed set of variants behind one capability interface:
 * - `cell`: a single grid unit that may carry a direction
 * - `blinking`: a primary/shade pair alternating twice per second
 * - `cluster`: a rigid group of cells (see Bomb)
 */

import { TICKS_PER_SECOND } from './constants';
import {
  type Direction,
  type Position,
  type Vector,
  DIRECTION_VECTORS,
  translate,
} from './geometry';
import { isActionTick } from './scheduler';

export type CellColor = 'line' | 'shade';
export type EntityVariant = 'cell' | 'blinking' | 'cluster';

/**
 * One drawable grid cell, correlated to its entity by id
 */
export interface Sprite {
  entityId: number;
  position: Position;
  color: CellColor;
}

export interface Entity {
  readonly id: number;
  readonly variant: EntityVariant;
  /** Anchor position (top-left cell for clusters) */
  readonly position: Position;
  readonly direction: Direction;
  update(tick: number, rate: number): void;
  setPosition(position: Position): void;
  setDirection(direction: Direction): void;
  /** Grid cells currently occupied */
  footprint(): Position[];
  sprites(): Sprite[];
}

export interface IdSequence {
  nextId(): number;
}

export interface CellOptions {
  color?: CellColor;
  direction?: Direction;
}

export class Cell implements Entity {
  readonly variant = 'cell';
  readonly id: number;
  color: CellColor;
  private pos: Position;
  private heading: Direction = 'none';
  private pending: Vector = DIRECTION_VECTORS.none;

  constructor(ids: IdSequence, position: Position, options: CellOptions = {}) {
    this.id = ids.nextId();
    this.pos = { col: position.col, row: position.row };
    this.color = options.color ?? 'line';
    this.setDirection(options.direction ?? 'none');
  }

  get position(): Position {
    return { col: this.pos.col, row: this.pos.row };
  }

  get direction(): Direction {
    return this.heading;
  }

  /** Step applied on the next action tick */
  get displacement(): Vector {
    return { dx: this.pending.dx, dy: this.pending.dy };
  }

  update(tick: number, rate: number): void {
    if (this.heading === 'none' || !isActionTick(tick, rate)) return;
    this.pos = translate(this.pos, this.pending.dx, this.pending.dy);
  }

  setPosition(position: Position): void {
    this.pos = { col: position.col, row: position.row };
  }

  setDirection(direction: Direction): void {
    this.heading = direction;
    this.pending = DIRECTION_VECTORS[direction];
  }

  footprint(): Position[] {
    return [this.position];
  }

  sprites(): Sprite[] {
    return [{ entityId: this.id, position: this.position, color: this.color }];
  }
}

/**
 * A cell that alternates with its shade: primary on each full second,
 * shade on each half second. Both halves always share position and direction.
 */
export class BlinkingCell implements Entity {
  readonly variant = 'blinking';
  readonly id: number;
  readonly primary: Cell;
  readonly shade: Cell;
  private active = true;

  constructor(ids: IdSequence, position: Position, options: { direction?: Direction } = {}) {
    this.id = ids.nextId();
    this.shade = new Cell(ids, position, { color: 'shade', direction: options.direction });
    this.primary = new Cell(ids, position, { color: 'line', direction: options.direction });
  }

  get position(): Position {
    return this.primary.position;
  }

  get direction(): Direction {
    return this.primary.direction;
  }

  /** Whether the primary half is the visible one */
  get isActive(): boolean {
    return this.active;
  }

  update(tick: number, rate: number): void {
    if (tick > 0) {
      const phase = tick % TICKS_PER_SECOND;
      if (phase === 0) {
        this.active = true;
      } else if (phase === Math.floor(TICKS_PER_SECOND / 2)) {
        this.active = false;
      }
    }
    this.shade.update(tick, rate);
    this.primary.update(tick, rate);
  }

  setPosition(position: Position): void {
    this.shade.setPosition(position);
    this.primary.setPosition(position);
  }

  setDirection(direction: Direction): void {
    this.shade.setDirection(direction);
    this.primary.setDirection(direction);
  }

  footprint(): Position[] {
    return [this.position];
  }

  sprites(): Sprite[] {
    const visible = this.active ? this.primary : this.shade;
    return [{ entityId: this.id, position: visible.position, color: visible.color }];
  }
}
