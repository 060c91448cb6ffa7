/**
 * Brick layouts, one sketch per level ('#' marks a brick).
 */

import type { Position } from '../shared/geometry';

export const LEVELS: readonly (readonly string[])[] = [
  [
    '##########',
    '#........#',
    '#........#',
    '#..####..#',
    '#..####..#',
    '#..####..#',
    '#..####..#',
    '#........#',
    '#........#',
    '##########',
  ],
  [
    '##......##',
    '###....###',
    '.###..###.',
    '..######..',
    '.###..###.',
    '###....###',
    '##......##',
  ],
  [
    '##########',
    '#...##...#',
    '##########',
    '#...##...#',
    '##########',
    '#...##...#',
    '##########',
  ],
];

/** Points per brick on each level */
export const BRICK_POINTS: readonly number[] = [15, 20, 30];

export function levelBricks(level: number): Position[] {
  const sketch = LEVELS[level - 1] ?? [];
  const bricks: Position[] = [];
  sketch.forEach((line, row) => {
    [...line].forEach((mark, col) => {
      if (mark === '#') bricks.push({ col, row });
    });
  });
  return bricks;
}

export function levelBonus(newLevel: number): number {
  return 3000 + 3000 * (newLevel - 1);
}
