import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { gamesMenuStep, showGamesMenu } from './gamesMenu';
import { MemoryScoreStore } from './shared/scores';
import type { GameTerminal, TerminalKeyEvent } from './utils';

function createFakeTerminal() {
  const writes: string[] = [];
  const keyListeners = new Set<(event: TerminalKeyEvent) => void>();
  const terminal: GameTerminal = {
    cols: 80,
    rows: 24,
    element: {},
    write: (data) => {
      writes.push(data);
    },
    onKey: (listener) => {
      keyListeners.add(listener);
      return {
        dispose: () => {
          keyListeners.delete(listener);
        },
      };
    },
    onResize: () => ({ dispose: () => {} }),
  };
  const press = (key: string) => {
    for (const listener of [...keyListeners]) {
      listener({ key, domEvent: { key, preventDefault: () => {}, stopPropagation: () => {} } });
    }
  };
  return { terminal, writes, press };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('gamesMenuStep', () => {
  it('moves with wrap-around', () => {
    expect(gamesMenuStep(0, 'ArrowUp')).toEqual({ kind: 'move', selection: 3 });
    expect(gamesMenuStep(3, 's')).toEqual({ kind: 'move', selection: 0 });
  });

  it('picks the highlighted game or a numbered one', () => {
    expect(gamesMenuStep(2, 'Enter')).toEqual({ kind: 'pick', gameId: 'asteroids' });
    expect(gamesMenuStep(0, '4')).toEqual({ kind: 'pick', gameId: 'tetris' });
  });

  it('ignores numbers past the last game', () => {
    expect(gamesMenuStep(0, '5')).toEqual({ kind: 'none' });
    expect(gamesMenuStep(0, '0')).toEqual({ kind: 'none' });
  });

  it('quits on Escape and Q', () => {
    expect(gamesMenuStep(1, 'Escape')).toEqual({ kind: 'quit' });
    expect(gamesMenuStep(1, 'Q')).toEqual({ kind: 'quit' });
  });
});

describe('showGamesMenu', () => {
  it('never draws when stopped before it starts', () => {
    const { terminal, writes } = createFakeTerminal();
    const menu = showGamesMenu(terminal);
    menu.stop();
    vi.advanceTimersByTime(50);

    expect(writes).toEqual([]);
    expect(menu.isRunning).toBe(false);
  });

  it('lists every game with its high score', () => {
    const { terminal, writes } = createFakeTerminal();
    const menu = showGamesMenu(terminal, { scores: new MemoryScoreStore({ Tetris: 1200 }) });
    vi.advanceTimersByTime(50);

    const screen = writes[writes.length - 1];
    expect(screen).toContain('G R I D   A R C A D E');
    for (const name of ['Snake', 'Breakout', 'Asteroids', 'Tetris']) {
      expect(screen).toContain(name);
    }
    expect(screen).toContain('1200');
    menu.stop();
  });

  it('picks the highlighted game on Enter', () => {
    const onGameSelect = vi.fn();
    const { terminal, press } = createFakeTerminal();
    const menu = showGamesMenu(terminal, { onGameSelect });
    vi.advanceTimersByTime(50);

    press('ArrowDown');
    press('Enter');
    expect(onGameSelect).toHaveBeenCalledWith('breakout');
    expect(menu.isRunning).toBe(false);
  });

  it('wraps around from the top', () => {
    const onGameSelect = vi.fn();
    const { terminal, press } = createFakeTerminal();
    showGamesMenu(terminal, { onGameSelect });
    vi.advanceTimersByTime(50);

    press('ArrowUp');
    press('Enter');
    expect(onGameSelect).toHaveBeenCalledWith('tetris');
  });

  it('picks by number', () => {
    const onGameSelect = vi.fn();
    const { terminal, press } = createFakeTerminal();
    showGamesMenu(terminal, { onGameSelect });
    vi.advanceTimersByTime(50);

    press('9');
    expect(onGameSelect).not.toHaveBeenCalled();
    press('3');
    expect(onGameSelect).toHaveBeenCalledWith('asteroids');
  });

  it('quits on q and leaves the alternate buffer', () => {
    const onQuit = vi.fn();
    const { terminal, writes, press } = createFakeTerminal();
    const menu = showGamesMenu(terminal, { onQuit });
    vi.advanceTimersByTime(50);

    press('q');
    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(menu.isRunning).toBe(false);
    expect(writes).toContain('\x1b[?1049l');
  });
});
