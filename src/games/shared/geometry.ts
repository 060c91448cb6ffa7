/**
 * Positions and directions on the 10x20 grid.
 */

import { GRID_COLS, GRID_ROWS } from './constants';

export interface Position {
  col: number;
  row: number;
}

export type Direction = 'none' | 'up' | 'down' | 'left' | 'right';

export interface Vector {
  dx: number;
  dy: number;
}

export const DIRECTION_VECTORS: Record<Direction, Vector> = {
  none: { dx: 0, dy: 0 },
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
};

const OPPOSITES: Record<Direction, Direction> = {
  none: 'none',
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function translate(pos: Position, dx: number, dy: number): Position {
  return { col: pos.col + dx, row: pos.row + dy };
}

export function step(pos: Position, direction: Direction): Position {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  return translate(pos, dx, dy);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.col === b.col && a.row === b.row;
}

export function isOnGrid(pos: Position): boolean {
  return pos.col >= 0 && pos.col < GRID_COLS && pos.row >= 0 && pos.row < GRID_ROWS;
}

/**
 * Stable map key for a position ("col,row")
 */
export function positionKey(pos: Position): string {
  return `${pos.col},${pos.row}`;
}
