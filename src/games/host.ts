/**
 * Terminal host
 *
 * Drives one game on a terminal: a 16ms simulation interval feeding the
 * tick scheduler, a render interval, key presses from the terminal and
 * key releases from window `keyup` events.
 */

import { dispatchGameQuit, dispatchGamesMenu } from './gameTransitions';
import { type GameId, getGame } from './registry';
import { TICK_MS } from './shared/constants';
import { type RandomSource, SimulationContext } from './shared/context';
import { AbsentSurfaceError, ArcadeError } from './shared/errors';
import type { ArcadeGame } from './shared/game';
import { mapKey } from './shared/keys';
import {
  GAME_OVER_MENU,
  PAUSE_MENU,
  type MenuEntry,
  pressMenuKey,
  renderMenu,
} from './shared/menu';
import { boardCenter, boardLayout, renderFrame } from './shared/render';
import { TickScheduler } from './shared/scheduler';
import type { ScoreStore } from './shared/scores';
import {
  type GameTerminal,
  type TerminalLike,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentShadeColor,
  getCurrentThemeColor,
  isTerminalValid,
} from './utils';

const RENDER_MS = 33;

export interface ArcadeController {
  stop: () => void;
  readonly isRunning: boolean;
  readonly game: ArcadeGame;
}

export interface ArcadeGameOptions {
  /** Where high scores live (in memory when omitted) */
  scores?: ScoreStore;
  random?: RandomSource;
}

export function runArcadeGame(
  terminal: TerminalLike | null | undefined,
  gameId: GameId,
  options: ArcadeGameOptions = {}
): ArcadeController {
  const candidate: GameTerminal | null | undefined = terminal;
  if (!isTerminalValid(candidate)) {
    throw new AbsentSurfaceError('runArcadeGame');
  }
  const term: GameTerminal = candidate;
  const info = getGame(gameId);
  if (!info) {
    throw new ArcadeError(`Unknown game: ${gameId}`);
  }

  const context = new SimulationContext({ scores: options.scores, random: options.random });
  const game = info.create(context);
  const scheduler = new TickScheduler();

  let running = true;
  let menuSelection = 0;
  let layout = boardLayout(term.cols, term.rows);

  const menuItems = (): readonly MenuEntry[] | null => {
    if (game.paused) return PAUSE_MENU;
    if (!game.isRunning()) return GAME_OVER_MENU;
    return null;
  };

  function render(): void {
    if (!running) return;
    let output = renderFrame(game.snapshot(), layout, {
      line: getCurrentThemeColor(),
      shade: getCurrentShadeColor(),
    });
    const items = menuItems();
    if (items) {
      const center = boardCenter(layout);
      output += renderMenu(items, menuSelection, { row: center.row - 1, col: center.col });
    }
    const hint = 'Arrows move  P pause  M menu  Q quit';
    output += `\x1b[${layout.top + 22};${Math.max(1, layout.left)}H\x1b[2m${getCurrentThemeColor()}${hint}\x1b[0m`;
    term.write(output);
  }

  function leave(): void {
    controller.stop();
    dispatchGamesMenu(term);
  }

  function quit(): void {
    controller.stop();
    dispatchGameQuit(term);
  }

  function handleMenuKey(entries: readonly MenuEntry[], key: string): void {
    const { selection, action } = pressMenuKey(entries, menuSelection, key);
    menuSelection = selection;
    if (!action) return;

    menuSelection = 0;
    switch (action) {
      case 'resume':
        game.handleInput('pause', true);
        break;
      case 'restart':
        game.handleInput('confirm', true);
        break;
      case 'games':
        leave();
        break;
      case 'quit':
        quit();
        break;
    }
  }

  function handleKey(rawKey: string): void {
    if (rawKey === 'Escape') {
      menuSelection = 0;
      game.handleInput('pause', true);
      return;
    }

    const items = menuItems();
    if (items) {
      handleMenuKey(items, rawKey);
      return;
    }

    if (rawKey === 'q' || rawKey === 'Q') {
      quit();
      return;
    }

    const key = mapKey(game.name, rawKey);
    if (!key) return;
    if (key === 'menu') {
      leave();
      return;
    }
    if (key === 'pause') menuSelection = 0;
    game.handleInput(key, true);
  }

  const handleKeyUp = (event: KeyboardEvent) => {
    if (!running) return;
    const key = mapKey(game.name, event.key);
    if (key) game.handleInput(key, false);
  };

  const keyListener = term.onKey(({ domEvent }) => {
    if (!running) return;
    domEvent.preventDefault();
    domEvent.stopPropagation();
    try {
      handleKey(domEvent.key);
    } catch (err) {
      console.error('[Host] Key handler failed:', err);
    }
  });

  const resizeListener = term.onResize(({ cols, rows }) => {
    layout = boardLayout(cols, rows);
    term.write('\x1b[2J');
  });

  if (typeof window !== 'undefined') {
    window.addEventListener('keyup', handleKeyUp);
  }

  enterAlternateBuffer(term, `game:${info.id}`);

  const gameInterval = setInterval(() => {
    try {
      game.tick(scheduler.advance());
    } catch (err) {
      console.error(`[Host] ${game.name} tick failed:`, err);
      controller.stop();
    }
  }, TICK_MS);

  const renderInterval = setInterval(() => {
    try {
      render();
    } catch (err) {
      console.error('[Host] Render failed:', err);
    }
  }, RENDER_MS);

  const controller: ArcadeController = {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(gameInterval);
      clearInterval(renderInterval);
      keyListener.dispose();
      resizeListener.dispose();
      if (typeof window !== 'undefined') {
        window.removeEventListener('keyup', handleKeyUp);
      }
      exitAlternateBuffer(term, `game:${info.id}`);
    },
    get isRunning() {
      return running;
    },
    game,
  };

  return controller;
}
