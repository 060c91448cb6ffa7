/**
 * Tetromino rotation tables.
 *
 * Each rotation lists its successor and four (col, row) offsets from the
 * piece anchor. Pieces spawn in rotation 1.
 */

import { type Position, translate } from '../shared/geometry';

export type ShapeName = 'T' | 'J' | 'L' | 'S' | 'Z' | 'I' | 'O';

export const SHAPE_NAMES: readonly ShapeName[] = ['T', 'J', 'L', 'S', 'Z', 'I', 'O'];

type Offset = readonly [number, number];

export interface Rotation {
  next: number;
  offsets: readonly [Offset, Offset, Offset, Offset];
}

export const SPAWN_ROTATION = 1;

export const ROTATIONS: Record<ShapeName, Readonly<Record<number, Rotation>>> = {
  T: {
    1: { next: 2, offsets: [[-1, 0], [0, 0], [1, 0], [0, -1]] },
    2: { next: 3, offsets: [[-1, 0], [0, 0], [0, -1], [0, 1]] },
    3: { next: 4, offsets: [[-1, 0], [0, 0], [1, 0], [0, 1]] },
    4: { next: 1, offsets: [[0, -1], [0, 0], [1, 0], [0, 1]] },
  },
  J: {
    1: { next: 2, offsets: [[-1, -1], [-1, 0], [0, 0], [1, 0]] },
    2: { next: 3, offsets: [[0, -1], [0, 0], [0, 1], [-1, 1]] },
    3: { next: 4, offsets: [[-1, -1], [0, -1], [1, -1], [1, 0]] },
    4: { next: 1, offsets: [[-1, -1], [0, -1], [-1, 0], [-1, 1]] },
  },
  L: {
    1: { next: 2, offsets: [[-1, 0], [0, 0], [1, 0], [1, -1]] },
    2: { next: 3, offsets: [[-1, -1], [0, -1], [0, 0], [0, 1]] },
    3: { next: 4, offsets: [[-1, 0], [-1, -1], [0, -1], [1, -1]] },
    4: { next: 1, offsets: [[-1, -1], [-1, 0], [-1, 1], [0, 1]] },
  },
  S: {
    1: { next: 2, offsets: [[-1, 0], [0, 0], [0, -1], [1, -1]] },
    2: { next: 1, offsets: [[0, 1], [0, 0], [-1, 0], [-1, -1]] },
  },
  Z: {
    1: { next: 2, offsets: [[-1, -1], [0, -1], [0, 0], [1, 0]] },
    2: { next: 1, offsets: [[0, -1], [0, 0], [-1, 0], [-1, 1]] },
  },
  I: {
    1: { next: 2, offsets: [[-1, 0], [0, 0], [1, 0], [2, 0]] },
    2: { next: 1, offsets: [[0, -1], [0, 0], [0, 1], [0, 2]] },
  },
  O: {
    1: { next: 1, offsets: [[0, 0], [0, 1], [1, 0], [1, 1]] },
  },
};

function rotationOf(shape: ShapeName, rotation: number): Rotation {
  return ROTATIONS[shape][rotation] ?? ROTATIONS[shape][SPAWN_ROTATION];
}

export function nextRotation(shape: ShapeName, rotation: number): number {
  return rotationOf(shape, rotation).next;
}

export function shapeCells(shape: ShapeName, rotation: number, anchor: Position): Position[] {
  return rotationOf(shape, rotation).offsets.map(([dc, dr]) => translate(anchor, dc, dr));
}
