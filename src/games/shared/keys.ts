/**
 * Semantic keys and per-game keymaps.
 */

import type { GameName } from './constants';

export type GameKey =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'confirm'
  | 'pause'
  | 'accelerate'
  | 'hold'
  | 'drop'
  | 'menu';

const COMMON_KEYS = new Map<string, GameKey>([
  ['ArrowUp', 'up'],
  ['ArrowDown', 'down'],
  ['ArrowLeft', 'left'],
  ['ArrowRight', 'right'],
  ['w', 'up'],
  ['s', 'down'],
  ['a', 'left'],
  ['d', 'right'],
  ['Enter', 'confirm'],
  ['p', 'pause'],
  ['P', 'pause'],
  ['Backspace', 'menu'],
  ['m', 'menu'],
  ['M', 'menu'],
]);

const GAME_KEYS: Record<GameName, ReadonlyMap<string, GameKey>> = {
  Snake: new Map([[' ', 'accelerate']]),
  Breakout: new Map([[' ', 'accelerate']]),
  Asteroids: new Map(),
  Tetris: new Map([[' ', 'drop'], ['c', 'hold'], ['C', 'hold']]),
};

/**
 * Maps a DOM key name to the semantic key a game understands
 */
export function mapKey(game: GameName, key: string): GameKey | null {
  return GAME_KEYS[game].get(key) ?? COMMON_KEYS.get(key) ?? null;
}
