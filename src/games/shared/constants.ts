/**
 * Grid and timing constants shared by every game.
 */

export const GRID_COLS = 10;
export const GRID_ROWS = 20;
export const GRID_CELLS = GRID_COLS * GRID_ROWS;

/** Length of one simulation frame, in milliseconds. */
export const TICK_MS = 16;

/** Frames per second derived from TICK_MS (62 at 16ms). */
export const TICKS_PER_SECOND = Math.floor(1000 / TICK_MS);

/** Scores are capped to 8 digits. */
export const MAX_SCORE = 10 ** 8 - 1;

export const GAME_NAMES = ['Snake', 'Breakout', 'Asteroids', 'Tetris'] as const;
export type GameName = typeof GAME_NAMES[number];
