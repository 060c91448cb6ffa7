/**
 * Game events
 *
 * Hosts never navigate on their own: they dispatch an event on window and
 * whoever embeds the games (the CLI, a web page) decides what happens next.
 */

import type { GameTerminal } from './utils';

export const GAME_EVENTS = {
  // Game wants to quit back to shell
  QUIT: 'grid-arcade:game-quit',
  // Game wants to show the games menu
  GAMES_MENU: 'grid-arcade:games-menu',
  // Launch a specific game by id
  LAUNCH_GAME: 'grid-arcade:launch-game',
} as const;

export interface GameEventDetail {
  terminal: GameTerminal;
  gameId?: string;
}

function dispatch(type: string, detail: GameEventDetail): void {
  if (typeof window === 'undefined') return;
  window.dispatchEvent(new CustomEvent<GameEventDetail>(type, { detail }));
}

export function dispatchGameQuit(terminal: GameTerminal): void {
  dispatch(GAME_EVENTS.QUIT, { terminal });
}

export function dispatchGamesMenu(terminal: GameTerminal): void {
  dispatch(GAME_EVENTS.GAMES_MENU, { terminal });
}

export function dispatchLaunchGame(terminal: GameTerminal, gameId: string): void {
  dispatch(GAME_EVENTS.LAUNCH_GAME, { terminal, gameId });
}
