/**
 * CLI entry point for grid-arcade
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the
 * terminal surface the games expect, so they run in any terminal emulator.
 */

// ---------------------------------------------------------------------------
// Window polyfill. Hosts listen for 'keyup' and dispatch game events on
// window; games only touch it once started, after this has run.
// ---------------------------------------------------------------------------

interface PolyfillEvent {
  type: string;
  key?: string;
  detail?: unknown;
}

type EventHandler = (event: PolyfillEvent) => void;
const eventListeners = new Map<string, Set<EventHandler>>();

const windowPolyfill = {
  addEventListener(type: string, handler: EventHandler) {
    const handlers = eventListeners.get(type) ?? new Set<EventHandler>();
    handlers.add(handler);
    eventListeners.set(type, handlers);
  },
  removeEventListener(type: string, handler: EventHandler) {
    eventListeners.get(type)?.delete(handler);
  },
  dispatchEvent(event: PolyfillEvent): boolean {
    const handlers = eventListeners.get(event.type);
    if (handlers) {
      for (const handler of [...handlers]) {
        handler(event);
      }
    }
    return true;
  },
};

if (typeof globalThis.window === 'undefined') {
  Object.defineProperty(globalThis, 'window', { value: windowPolyfill, configurable: true });
}

import {
  GAME_EVENTS,
  games,
  getGame,
  runArcadeGame,
  setTheme,
  showGamesMenu,
  type Disposable,
  type GameId,
  type GameTerminal,
  type TerminalKeyEvent,
} from './games';
import { DEFAULT_SCORES_PATH, JsonFileScoreStore } from './games/shared/scores';
import { getThemeModes, isValidThemeMode } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

/** Raw stdin has no key release, so one is simulated after this delay */
const KEY_RELEASE_MS = 80;

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function createDomEvent(key: string): TerminalKeyEvent['domEvent'] {
  return {
    key,
    preventDefault: () => {},
    stopPropagation: () => {},
  };
}

// Track held keys for keyup simulation
const heldKeys = new Map<string, ReturnType<typeof setTimeout>>();

function subscribe<T>(listeners: T[], listener: T): Disposable {
  listeners.push(listener);
  return {
    dispose: () => {
      const idx = listeners.indexOf(listener);
      if (idx !== -1) listeners.splice(idx, 1);
    },
  };
}

function cleanup() {
  for (const timer of heldKeys.values()) clearTimeout(timer);
  heldKeys.clear();
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
  process.stdout.write('\x1b[?1049l');
  process.stdout.write('\x1b[?25h');
  process.stdout.write('\x1b[0m');
}

function exit(code: number): never {
  cleanup();
  process.exit(code);
}

function createNodeTerminal(): GameTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];
  const resizeListeners: ((size: { cols: number; rows: number }) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      exit(0);
    }

    const key = parseKey(data);
    const domEvent = createDomEvent(key);

    const pending = heldKeys.get(key);
    if (pending) {
      clearTimeout(pending);
    }
    heldKeys.set(key, setTimeout(() => {
      heldKeys.delete(key);
      windowPolyfill.dispatchEvent({ type: 'keyup', key });
    }, KEY_RELEASE_MS));

    for (const listener of [...keyListeners]) {
      listener({ key, domEvent });
    }
  });

  process.stdout.on('resize', () => {
    const size = { cols: process.stdout.columns || 80, rows: process.stdout.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  });

  // Synchronized output: the terminal paints each frame atomically
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  return {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    element: {}, // Truthy for isTerminalValid check
    onKey: (callback) => subscribe(keyListeners, callback),
    onResize: (callback) => subscribe(resizeListeners, callback),
  };
}

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

function launchGame(terminal: GameTerminal, gameId: GameId, store: JsonFileScoreStore) {
  try {
    runArcadeGame(terminal, gameId, { scores: store });
  } catch (err) {
    console.error('[CLI] Failed to start game:', err);
    exit(1);
  }
}

function openMenu(terminal: GameTerminal, store: JsonFileScoreStore) {
  showGamesMenu(terminal, {
    scores: store,
    onGameSelect: (gameId) => launchGame(terminal, gameId, store),
    onQuit: () => exit(0),
  });
}

function setupGameEvents(terminal: GameTerminal, store: JsonFileScoreStore) {
  windowPolyfill.addEventListener(GAME_EVENTS.QUIT, () => {
    exit(0);
  });
  windowPolyfill.addEventListener(GAME_EVENTS.GAMES_MENU, () => {
    setTimeout(() => openMenu(terminal, store), 100);
  });
  windowPolyfill.addEventListener(GAME_EVENTS.LAUNCH_GAME, (event) => {
    const detail = event.detail;
    const gameId = typeof detail === 'object' && detail !== null && 'gameId' in detail ? detail.gameId : undefined;
    const game = typeof gameId === 'string' ? getGame(gameId) : undefined;
    if (game) {
      setTimeout(() => launchGame(terminal, game.id, store), 100);
    }
  });
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  grid-arcade: four arcade games on a 10x20 grid

  Usage:
    grid-arcade                    Interactive game menu
    grid-arcade <game>             Launch a game directly
    grid-arcade scores             Show high scores
    grid-arcade scores reset       Reset high scores
    grid-arcade --theme <theme>    Set color theme
    grid-arcade --scores <path>    High-score file (default: ${DEFAULT_SCORES_PATH})
    grid-arcade --list             List all games
    grid-arcade --help             Show this help

  Games:
    ${games.map(g => `${g.id.padEnd(16)} ${g.description}`).join('\n    ')}

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    Arrow keys / WASD    Move
    Space                Accelerate (Snake, Breakout) / drop (Tetris)
    C                    Hold piece (Tetris)
    Enter                Restart
    P / ESC              Pause menu
    M / Backspace        Back to the games menu
    Q                    Quit

  Examples:
    grid-arcade snake
    grid-arcade tetris --theme green
    grid-arcade --scores ./scores.json
`);
}

/**
 * Removes `--name value` from args and returns the value
 */
function takeOption(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  args.splice(idx, value === undefined ? 1 : 2);
  return value;
}

async function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    return;
  }

  if (args.includes('--list') || args.includes('-l')) {
    for (const game of games) {
      console.log(`  ${game.id.padEnd(16)} ${game.description}`);
    }
    return;
  }

  const theme = takeOption(args, '--theme');
  if (theme !== undefined) {
    if (!isValidThemeMode(theme)) {
      console.error(`Unknown theme: ${theme}`);
      console.error(`Available themes: ${getThemeModes().join(', ')}`);
      process.exitCode = 1;
      return;
    }
    setTheme(theme);
  }

  const store = new JsonFileScoreStore(takeOption(args, '--scores') ?? DEFAULT_SCORES_PATH);

  if (args[0] === 'scores') {
    const { scoresCommand } = await import('./scores');
    await scoresCommand(args.slice(1), store);
    return;
  }

  // Direct game launch: grid-arcade snake
  const gameName = args[0];
  const game = gameName ? getGame(gameName) : undefined;
  if (gameName && !game) {
    console.error(`Unknown game: ${gameName}`);
    console.error(`Available games: ${games.map(g => g.id).join(', ')}`);
    process.exitCode = 1;
    return;
  }

  const terminal = createNodeTerminal();
  setupGameEvents(terminal, store);
  process.on('exit', cleanup);
  process.on('SIGINT', () => exit(0));
  process.on('SIGTERM', () => exit(0));

  if (game) {
    launchGame(terminal, game.id, store);
  } else {
    openMenu(terminal, store);
  }
}

main().catch((err) => {
  console.error('[CLI] Fatal error:', err);
  process.exitCode = 1;
});
