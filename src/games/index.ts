/**
 * grid-arcade games
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run a game: runGame('snake', terminal)
 * 3. Handle game events: listen for GAME_EVENTS on window
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getCurrentShadeColor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,
} from './utils';

export type { Disposable, PhosphorMode, GameTerminal, TerminalKeyEvent, TerminalLike } from './utils';

// Re-export events
export {
  GAME_EVENTS,
  dispatchGameQuit,
  dispatchGamesMenu,
  dispatchLaunchGame,
} from './gameTransitions';
export type { GameEventDetail } from './gameTransitions';

// Re-export menu utilities
export { pressMenuKey, findShortcut, renderMenu, PAUSE_MENU, GAME_OVER_MENU } from './shared/menu';
export type { MenuAction, MenuEntry, MenuKeyResult } from './shared/menu';

// Engine
export * from './shared/constants';
export { TickScheduler, actionDivisor, isActionTick } from './shared/scheduler';
export type { Direction, Position, Vector } from './shared/geometry';
export { Cell, BlinkingCell } from './shared/entities';
export type { CellColor, Entity, EntityVariant, Sprite } from './shared/entities';
export { Bomb, BombRegistry } from './shared/bomb';
export { EntityStore } from './shared/world';
export { SimulationContext } from './shared/context';
export type { RandomSource, SimulationContextOptions } from './shared/context';
export { Game } from './shared/game';
export type { ArcadeGame, CellSprite, GameDetail, GameOutcome, GamePhase, GameSnapshot } from './shared/game';
export { mapKey } from './shared/keys';
export type { GameKey } from './shared/keys';
export { ArcadeError, AbsentSurfaceError } from './shared/errors';
export {
  DEFAULT_SCORES_PATH,
  JsonFileScoreStore,
  MemoryScoreStore,
  emptyScoreTable,
} from './shared/scores';
export type { ScoreStore, ScoreTable } from './shared/scores';
export { boardLayout, renderFrame } from './shared/render';

// Games
export { SnakeGame } from './snake';
export type { SnakeOptions } from './snake';
export { BreakoutGame } from './breakout';
export type { BreakoutOptions } from './breakout';
export { AsteroidsGame } from './asteroids';
export type { AsteroidsOptions } from './asteroids';
export { TetrisGame } from './tetris';
export type { TetrisOptions } from './tetris';

import { runArcadeGame, type ArcadeController, type ArcadeGameOptions } from './host';
import { getGame } from './registry';
import type { TerminalLike } from './utils';

export { games, getGame } from './registry';
export type { GameId, GameInfo } from './registry';
export { runArcadeGame } from './host';
export type { ArcadeController, ArcadeGameOptions } from './host';

/**
 * Run a game by id or name
 */
export function runGame(
  id: string,
  terminal: TerminalLike,
  options?: ArcadeGameOptions
): ArcadeController | undefined {
  const game = getGame(id);
  return game ? runArcadeGame(terminal, game.id, options) : undefined;
}

// Re-export games menu
export { gamesMenuStep, showGamesMenu } from './gamesMenu';
export type { GamesMenuController, GamesMenuOptions, GamesMenuStep } from './gamesMenu';
