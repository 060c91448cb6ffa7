/**
 * Tetris
 *
 * Seven tetrominoes fall into a 10x20 well. Full rows clear and score by
 * the current speed and stack height. Speed rises every 30 seconds; the
 * game ends when the stack overflows the top.
 */

import { GRID_COLS, GRID_ROWS, TICKS_PER_SECOND } from '../shared/constants';
import type { SimulationContext } from '../shared/context';
import { Cell } from '../shared/entities';
import { Game, type GameDetail } from '../shared/game';
import { type Direction, type Position, DIRECTION_VECTORS, translate } from '../shared/geometry';
import type { GameKey } from '../shared/keys';
import { isActionTick } from '../shared/scheduler';
import { SHAPE_NAMES, SPAWN_ROTATION, type ShapeName, nextRotation, shapeCells } from './shapes';
import { FallenStack } from './stack';

export interface TetrisOptions {
  /** Rows fallen per second at the start (default 1) */
  startSpeed?: number;
}

type TetrisEntities = {
  piece: Cell;
  fallen: Cell;
};

export const SPAWN_ANCHOR: Position = { col: 4, row: 0 };
export const SPEED_UP_TICKS = 30 * TICKS_PER_SECOND;
export const SPEED_FACTOR = 10 ** 0.05;
export const MAX_SPEED = 10;

const LINE_BASE: Readonly<Record<number, number>> = { 1: 2, 2: 6, 3: 12, 4: 20 };

/**
 * Points for clearing `lines` rows at once
 */
export function linePoints(lines: number, speed: number, fallenHeight: number): number {
  const base = LINE_BASE[lines];
  if (base === undefined) return 0;
  return Math.floor(base + speed * fallenHeight) * 15;
}

/** Steps per second of a held left/right/down key */
export function lateralRate(speed: number): number {
  return 7 + 3 * speed;
}

export class TetrisGame extends Game<TetrisEntities> {
  private readonly startSpeed: number;
  private activeShape: ShapeName = 'T';
  private storedShape: ShapeName = 'T';
  private rotation = SPAWN_ROTATION;
  private anchor: Position = SPAWN_ANCHOR;
  private swapLocked = false;
  private pieceDirection: Direction = 'none';
  private gameTicks = 0;
  private stack = new FallenStack([]);
  private fallenHeight = 0;
  private toppedOut = false;

  constructor(context: SimulationContext, options: TetrisOptions = {}) {
    super('Tetris', context, { piece: [], fallen: [] });
    this.startSpeed = options.startSpeed ?? 1;
    this.setup();
  }

  get shape(): ShapeName {
    return this.activeShape;
  }

  get nextShape(): ShapeName {
    return this.storedShape;
  }

  get piece(): Position[] {
    return this.entities.list('piece').map((cell) => cell.position);
  }

  get fallen(): Position[] {
    return this.stack.positions();
  }

  get currentSpeed(): number {
    return this.speed;
  }

  get stackHeight(): number {
    return this.fallenHeight;
  }

  checkVictory(): boolean {
    return false;
  }

  checkDefeat(): boolean {
    return this.fallenHeight > GRID_ROWS || this.toppedOut;
  }

  /**
   * Free rows below the piece before it rests on the stack or the floor
   */
  height(): number {
    const lowest = new Map<number, number>();
    for (const { col, row } of this.piece) {
      lowest.set(col, Math.max(lowest.get(col) ?? row, row));
    }
    let gap = Infinity;
    for (const [col, row] of lowest) {
      const below = this.stack.nearestBelow(col, row);
      gap = Math.min(gap, below === null ? GRID_ROWS - 1 - row : below - row - 1);
    }
    return gap === Infinity ? 0 : gap;
  }

  /** Moves the piece one cell if the target is free. */
  move(direction: Direction): boolean {
    const { dx, dy } = DIRECTION_VECTORS[direction];
    if (dx === 0 && dy === 0) return false;
    const candidate = this.piece.map((pos) => translate(pos, dx, dy));
    if (!this.fits(candidate)) return false;
    this.anchor = translate(this.anchor, dx, dy);
    this.placePiece(candidate);
    return true;
  }

  rotate(): boolean {
    const next = nextRotation(this.activeShape, this.rotation);
    const candidate = shapeCells(this.activeShape, next, this.anchor);
    if (!this.fits(candidate)) return false;
    this.rotation = next;
    this.placePiece(candidate);
    return true;
  }

  /** Drops the piece straight down and locks it */
  drop(): void {
    const gap = this.height();
    if (gap > 0) {
      this.anchor = translate(this.anchor, 0, gap);
      this.placePiece(this.piece.map((pos) => translate(pos, 0, gap)));
    }
    this.lock();
  }

  /**
   * Exchanges the falling and stored shapes, once per piece. Refused when
   * the stored shape would overlap the stack at the spawn point.
   */
  swap(): boolean {
    if (this.swapLocked) return false;
    const cells = shapeCells(this.storedShape, SPAWN_ROTATION, SPAWN_ANCHOR);
    if (!this.fits(cells)) return false;
    const held = this.storedShape;
    this.storedShape = this.activeShape;
    this.activeShape = held;
    this.rotation = SPAWN_ROTATION;
    this.anchor = SPAWN_ANCHOR;
    this.placePiece(cells);
    this.swapLocked = true;
    return true;
  }

  protected setup(): void {
    this.speed = this.startSpeed;
    this.gameTicks = 0;
    this.pieceDirection = 'none';
    this.fallenHeight = 0;
    this.toppedOut = false;
    this.stack = new FallenStack(this.entities.list('fallen'));
    const first = this.randomShape();
    this.storedShape = this.randomShape();
    this.spawn(first);
  }

  protected onKey(key: GameKey, isPress: boolean): void {
    if (this.toppedOut) return;
    if (!isPress) {
      if (key === this.pieceDirection) this.pieceDirection = 'none';
      return;
    }
    switch (key) {
      case 'up':
        this.rotate();
        break;
      case 'left':
      case 'right':
      case 'down':
        if (this.pieceDirection !== key) this.move(key);
        this.pieceDirection = key;
        break;
      case 'drop':
        this.drop();
        break;
      case 'hold':
        this.swap();
        break;
    }
  }

  protected step(tick: number): void {
    if (this.toppedOut) return;
    this.gameTicks += 1;

    if (isActionTick(tick, this.speed)) {
      if (this.height() === 0) {
        this.lock();
      } else {
        this.move('down');
      }
    }
    if (this.speed <= MAX_SPEED && this.gameTicks % SPEED_UP_TICKS === 0) {
      this.speed *= SPEED_FACTOR;
    }
    if (this.pieceDirection !== 'none' && isActionTick(tick, lateralRate(this.speed))) {
      this.move(this.pieceDirection);
    }
  }

  protected details(): GameDetail[] {
    return [
      { label: 'SPEED', value: this.speed.toFixed(2) },
      { label: 'NEXT', value: this.storedShape },
    ];
  }

  protected preview(): Position[] {
    return shapeCells(this.storedShape, SPAWN_ROTATION, { col: 1, row: 1 });
  }

  private randomShape(): ShapeName {
    return this.context.pick(SHAPE_NAMES);
  }

  private spawn(shape: ShapeName): void {
    this.activeShape = shape;
    this.rotation = SPAWN_ROTATION;
    this.anchor = SPAWN_ANCHOR;
    this.swapLocked = false;
    const piece = this.entities.list('piece');
    piece.length = 0;
    const cells = shapeCells(shape, this.rotation, this.anchor);
    for (const pos of cells) {
      piece.push(new Cell(this.context, pos));
    }
    // No room at the spawn point: the stack has reached the top
    if (cells.some((pos) => this.stack.has(pos))) this.toppedOut = true;
  }

  private placePiece(positions: readonly Position[]): void {
    this.entities.list('piece').forEach((cell, i) => cell.setPosition(positions[i]));
  }

  private fits(cells: readonly Position[]): boolean {
    return cells.every(
      (pos) => pos.col >= 0 && pos.col < GRID_COLS && pos.row < GRID_ROWS && !this.stack.has(pos),
    );
  }

  private lock(): void {
    const cells = this.entities.list('piece').splice(0);
    if (!this.stack.absorb(cells)) this.toppedOut = true;
    this.fallenHeight = this.stack.height();
    const lines = this.stack.removeFullLines();
    if (lines > 0) {
      this.score += linePoints(lines, this.speed, this.fallenHeight);
      this.updateScore();
    }
    this.spawn(this.storedShape);
    this.storedShape = this.randomShape();
  }
}
