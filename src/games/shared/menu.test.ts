import { describe, it, expect } from 'vitest';
import { GAME_OVER_MENU, PAUSE_MENU, type MenuEntry, findShortcut, pressMenuKey, renderMenu } from './menu';
import { setTheme } from '../utils';

const entries: MenuEntry[] = [
  { label: 'Resume', shortcut: 'P', action: 'resume' },
  { label: 'Restart', shortcut: 'R', action: 'restart' },
  { label: 'Quit', action: 'quit' },
];

describe('pressMenuKey', () => {
  describe('movement', () => {
    it('moves with arrows', () => {
      expect(pressMenuKey(entries, 1, 'ArrowUp')).toEqual({ selection: 0, action: null });
      expect(pressMenuKey(entries, 1, 'ArrowDown')).toEqual({ selection: 2, action: null });
    });

    it('moves with w and s', () => {
      expect(pressMenuKey(entries, 1, 'w').selection).toBe(0);
      expect(pressMenuKey(entries, 1, 's').selection).toBe(2);
    });

    it('wraps at both ends', () => {
      expect(pressMenuKey(entries, 0, 'ArrowUp').selection).toBe(2);
      expect(pressMenuKey(entries, 2, 'ArrowDown').selection).toBe(0);
    });
  });

  describe('picking', () => {
    it('picks the selected entry with Enter or Space', () => {
      expect(pressMenuKey(entries, 2, 'Enter')).toEqual({ selection: 2, action: 'quit' });
      expect(pressMenuKey(entries, 1, ' ')).toEqual({ selection: 1, action: 'restart' });
    });

    it('picks by shortcut regardless of the selection', () => {
      expect(pressMenuKey(entries, 2, 'r')).toEqual({ selection: 1, action: 'restart' });
    });
  });

  it('leaves the selection alone for other keys', () => {
    expect(pressMenuKey(entries, 1, 'x')).toEqual({ selection: 1, action: null });
  });

  it('does nothing on an empty menu', () => {
    expect(pressMenuKey([], 0, 'Enter')).toEqual({ selection: 0, action: null });
  });
});

describe('findShortcut', () => {
  it('matches in either case', () => {
    expect(findShortcut(entries, 'p')).toBe(0);
    expect(findShortcut(entries, 'R')).toBe(1);
  });

  it('returns -1 without a match', () => {
    expect(findShortcut(entries, 'q')).toBe(-1);
  });

  it('takes the first of duplicate shortcuts', () => {
    const dupes: MenuEntry[] = [
      { label: 'First', shortcut: 'A', action: 'resume' },
      { label: 'Second', shortcut: 'A', action: 'quit' },
    ];
    expect(findShortcut(dupes, 'a')).toBe(0);
  });
});

describe('renderMenu', () => {
  it('highlights the selected entry and dims the others', () => {
    setTheme('green');
    const output = renderMenu(
      [
        { label: 'GO', action: 'resume' },
        { label: 'STOP', shortcut: 'S', action: 'quit' },
      ],
      0,
      { row: 5, col: 20 },
    );
    expect(output).toBe(
      '\x1b[5;17H\x1b[1;93m► GO ◄\x1b[0m' +
      '\x1b[6;14H\x1b[2m\x1b[92m  STOP [S]  \x1b[0m'
    );
  });
});

describe('menus', () => {
  it('pause menu resumes, restarts, leaves and quits', () => {
    expect(PAUSE_MENU.map((entry) => entry.action)).toEqual(['resume', 'restart', 'games', 'quit']);
    expect(pressMenuKey(PAUSE_MENU, 0, 'm').action).toBe('games');
  });

  it('game over menu offers another round first', () => {
    expect(GAME_OVER_MENU[0].label).toBe('PLAY AGAIN');
    expect(pressMenuKey(GAME_OVER_MENU, 0, 'Enter').action).toBe('restart');
  });
});
