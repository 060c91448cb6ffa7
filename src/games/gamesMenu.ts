/**
 * Games Menu
 *
 * Selector listing every game with its high score. Arrow keys move,
 * Enter or 1-4 picks, Q or Escape quits.
 */

import { type GameId, games } from './registry';
import type { ScoreStore } from './shared/scores';
import {
  type Disposable,
  type GameTerminal,
  type TerminalLike,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentThemeColor,
  isTerminalValid,
} from './utils';

export interface GamesMenuController {
  stop: () => void;
  isRunning: boolean;
}

export interface GamesMenuOptions {
  onGameSelect?: (gameId: GameId) => void;
  onQuit?: () => void;
  /** High scores shown beside each game */
  scores?: ScoreStore;
}

const BOX_WIDTH = 38;
/** Lets the key event that opened the menu finish before listening */
const START_DELAY_MS = 50;

export type GamesMenuStep =
  | { kind: 'move'; selection: number }
  | { kind: 'pick'; gameId: GameId }
  | { kind: 'quit' }
  | { kind: 'none' };

/**
 * What a key does on the games menu with `selection` highlighted
 */
export function gamesMenuStep(selection: number, key: string): GamesMenuStep {
  const count = games.length;
  if (key === 'Escape' || key === 'q' || key === 'Q') return { kind: 'quit' };
  if (key === 'ArrowUp' || key === 'w') return { kind: 'move', selection: (selection - 1 + count) % count };
  if (key === 'ArrowDown' || key === 's') return { kind: 'move', selection: (selection + 1) % count };
  if (key === 'Enter') return { kind: 'pick', gameId: games[selection].id };

  const slot = /^[1-9]$/.test(key) ? Number(key) : 0;
  if (slot >= 1 && slot <= count) return { kind: 'pick', gameId: games[slot - 1].id };
  return { kind: 'none' };
}

function boxRow(boxX: number, y: number, style: string, text: string): string {
  const frame = getCurrentThemeColor();
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `\x1b[${y};${boxX}H${frame}║\x1b[0m${style}${padded}\x1b[0m${frame}║\x1b[0m`;
}

function renderMenuScreen(cols: number, rows: number, selection: number, scores?: ScoreStore): string {
  const frame = getCurrentThemeColor();
  const boxX = Math.max(1, Math.floor((cols - BOX_WIDTH) / 2));
  const inner = BOX_WIDTH - 2;
  let output = '\x1b[2J\x1b[H';

  const title = 'G R I D   A R C A D E';
  output += `\x1b[2;${Math.max(1, Math.floor((cols - title.length) / 2))}H${frame}\x1b[1m${title}\x1b[0m`;
  const subtitle = scores ? 'Select a game            HIGH SCORE' : 'Select a game';
  output += `\x1b[4;${boxX + 1}H\x1b[2m${subtitle}\x1b[0m`;

  output += `\x1b[5;${boxX}H${frame}╔${'═'.repeat(inner)}╗\x1b[0m`;
  games.forEach((game, i) => {
    const selected = i === selection;
    const y = 6 + i * 2;
    const label = `${selected ? '▶' : ' '} [${i + 1}] ${game.name}`;
    const best = scores ? String(scores.read(game.name)) : '';
    const gap = Math.max(1, inner - label.length - best.length - 1);
    output += boxRow(boxX, y, selected ? '\x1b[1;7m' : '\x1b[33m', `${label}${' '.repeat(gap)}${best}`);
    output += boxRow(boxX, y + 1, selected ? '\x1b[2;7m' : '\x1b[2m', `    ${game.description}`);
  });
  const bottomY = 6 + games.length * 2;
  output += `\x1b[${bottomY};${boxX}H${frame}╚${'═'.repeat(inner)}╝\x1b[0m`;

  const controls = `↑↓ Navigate | ENTER Select | 1-${games.length} Quick | Q Quit`;
  const controlsY = Math.max(bottomY + 2, rows - 1);
  output += `\x1b[${controlsY};${Math.max(1, Math.floor((cols - controls.length) / 2))}H\x1b[2m${controls}\x1b[0m`;
  return output;
}

/**
 * Show the game selector. Drawing and key handling start shortly after
 * the call; stopping before then cancels the start.
 */
export function showGamesMenu(terminal: TerminalLike, options: GamesMenuOptions = {}): GamesMenuController {
  const term: GameTerminal = terminal;
  const { onGameSelect, onQuit, scores } = options;

  let running = true;
  let selection = 0;
  const listeners: Disposable[] = [];

  const render = () => term.write(renderMenuScreen(term.cols, term.rows, selection, scores));

  const stop = () => {
    if (!running) return;
    running = false;
    clearTimeout(startTimer);
    if (listeners.length > 0) {
      listeners.splice(0).forEach((listener) => listener.dispose());
      exitAlternateBuffer(term, 'games-menu');
    }
  };

  function handleKey(key: string): void {
    const step = gamesMenuStep(selection, key);
    switch (step.kind) {
      case 'move':
        selection = step.selection;
        render();
        break;
      case 'pick':
        stop();
        onGameSelect?.(step.gameId);
        break;
      case 'quit':
        stop();
        onQuit?.();
        break;
      case 'none':
        break;
    }
  }

  const startTimer = setTimeout(() => {
    if (!isTerminalValid(term)) {
      console.warn('[GamesMenu] Terminal became invalid before menu could start');
      running = false;
      return;
    }

    enterAlternateBuffer(term, 'games-menu');
    listeners.push(
      term.onResize(() => render()),
      term.onKey(({ domEvent }) => {
        if (!running) return;
        domEvent.preventDefault();
        domEvent.stopPropagation();
        try {
          handleKey(domEvent.key);
        } catch (err) {
          console.error('[GamesMenu] Key handler error:', err);
          stop();
        }
      }),
    );
    render();
  }, START_DELAY_MS);

  return {
    stop,
    get isRunning() { return running; },
  };
}
