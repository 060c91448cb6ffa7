/**
 * The settled cells at the bottom of the well.
 *
 * Wraps the game's `fallen` entity list with a position index for
 * collision checks and handles line clears.
 */

import { GRID_COLS, GRID_ROWS } from '../shared/constants';
import type { Cell } from '../shared/entities';
import { type Position, positionKey } from '../shared/geometry';

export class FallenStack {
  private index = new Map<string, Cell>();

  constructor(private readonly cells: Cell[]) {
    this.reindex();
  }

  get size(): number {
    return this.cells.length;
  }

  positions(): Position[] {
    return this.cells.map((cell) => cell.position);
  }

  has(pos: Position): boolean {
    return this.index.has(positionKey(pos));
  }

  /**
   * Adds locked cells. Returns false when any of them landed on an
   * occupied position (the well is full).
   */
  absorb(cells: readonly Cell[]): boolean {
    let clear = true;
    for (const cell of cells) {
      const key = positionKey(cell.position);
      if (this.index.has(key)) {
        clear = false;
        continue;
      }
      this.cells.push(cell);
      this.index.set(key, cell);
    }
    return clear;
  }

  /** Rows between the top of the stack and the floor */
  height(): number {
    if (this.cells.length === 0) return 0;
    const top = Math.min(GRID_ROWS, ...this.cells.map((cell) => cell.position.row));
    return GRID_ROWS - top;
  }

  /** Row of the nearest settled cell below `row` in `col`, if any */
  nearestBelow(col: number, row: number): number | null {
    let nearest: number | null = null;
    for (const cell of this.cells) {
      const pos = cell.position;
      if (pos.col === col && pos.row > row && (nearest === null || pos.row < nearest)) {
        nearest = pos.row;
      }
    }
    return nearest;
  }

  /**
   * Clears complete rows from top to bottom, shifting everything above each
   * cleared row down by one. Returns the number of rows cleared.
   */
  removeFullLines(): number {
    let cleared = 0;
    for (let row = 0; row < GRID_ROWS; row++) {
      const inRow = this.cells.filter((cell) => cell.position.row === row);
      if (inRow.length < GRID_COLS) continue;

      for (let i = this.cells.length - 1; i >= 0; i--) {
        if (this.cells[i].position.row === row) this.cells.splice(i, 1);
      }
      for (const cell of this.cells) {
        const { col, row: r } = cell.position;
        if (r < row) cell.setPosition({ col, row: r + 1 });
      }
      cleared += 1;
    }
    if (cleared > 0) this.reindex();
    return cleared;
  }

  private reindex(): void {
    this.index = new Map(this.cells.map((cell) => [positionKey(cell.position), cell]));
  }
}
