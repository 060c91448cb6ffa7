/**
 * Game registry with metadata
 */

import { AsteroidsGame } from './asteroids';
import { BreakoutGame } from './breakout';
import type { GameName } from './shared/constants';
import type { SimulationContext } from './shared/context';
import type { ArcadeGame } from './shared/game';
import { SnakeGame } from './snake';
import { TetrisGame } from './tetris';

export type GameId = 'snake' | 'breakout' | 'asteroids' | 'tetris';

export interface GameInfo {
  id: GameId;
  name: GameName;
  description: string;
  create: (context: SimulationContext) => ArcadeGame;
}

export const games: readonly GameInfo[] = [
  { id: 'snake', name: 'Snake', description: 'Eat and grow', create: (ctx) => new SnakeGame(ctx) },
  { id: 'breakout', name: 'Breakout', description: 'Break all the bricks', create: (ctx) => new BreakoutGame(ctx) },
  { id: 'asteroids', name: 'Asteroids', description: 'Shoot the rocks', create: (ctx) => new AsteroidsGame(ctx) },
  { id: 'tetris', name: 'Tetris', description: 'Stack the blocks', create: (ctx) => new TetrisGame(ctx) },
];

/**
 * Look a game up by id or display name (case-insensitive)
 */
export function getGame(id: string): GameInfo | undefined {
  const wanted = id.toLowerCase();
  return games.find((g) => g.id === wanted || g.name.toLowerCase() === wanted);
}
