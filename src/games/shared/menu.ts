/**
 * In-game menus
 *
 * The pause and game-over overlays: a short list of entries moved through
 * with arrows or WASD, confirmed with Enter or Space, or picked directly by
 * a one-letter shortcut.
 */

import { getCurrentThemeColor } from '../utils';

export type MenuAction = 'resume' | 'restart' | 'games' | 'quit';

export interface MenuEntry {
  label: string;
  shortcut?: string;
  action: MenuAction;
}

export interface MenuKeyResult {
  selection: number;
  /** Set when the key picked an entry */
  action: MenuAction | null;
}

export const PAUSE_MENU: readonly MenuEntry[] = [
  { label: 'RESUME', shortcut: 'P', action: 'resume' },
  { label: 'RESTART', shortcut: 'R', action: 'restart' },
  { label: 'GAMES', shortcut: 'M', action: 'games' },
  { label: 'QUIT', shortcut: 'Q', action: 'quit' },
];

export const GAME_OVER_MENU: readonly MenuEntry[] = [
  { label: 'PLAY AGAIN', shortcut: 'R', action: 'restart' },
  { label: 'GAMES', shortcut: 'M', action: 'games' },
  { label: 'QUIT', shortcut: 'Q', action: 'quit' },
];

/**
 * Index of the entry whose shortcut matches `key` in either case, or -1
 */
export function findShortcut(entries: readonly MenuEntry[], key: string): number {
  const wanted = key.toLowerCase();
  return entries.findIndex((entry) => entry.shortcut?.toLowerCase() === wanted);
}

export function pressMenuKey(entries: readonly MenuEntry[], selection: number, key: string): MenuKeyResult {
  const count = entries.length;
  if (count === 0) return { selection, action: null };

  const shortcut = findShortcut(entries, key);
  if (shortcut !== -1) {
    return { selection: shortcut, action: entries[shortcut].action };
  }

  switch (key) {
    case 'ArrowUp':
    case 'w':
      return { selection: (selection - 1 + count) % count, action: null };
    case 'ArrowDown':
    case 's':
      return { selection: (selection + 1) % count, action: null };
    case 'Enter':
    case ' ':
      return { selection, action: entries[selection]?.action ?? null };
    default:
      return { selection, action: null };
  }
}

/**
 * One entry per row, each centered on `anchor.col`. The selected entry is
 * bold between arrows; the rest are dimmed in the theme color.
 */
export function renderMenu(
  entries: readonly MenuEntry[],
  selection: number,
  anchor: { row: number; col: number }
): string {
  const themeColor = getCurrentThemeColor();
  let output = '';

  entries.forEach((entry, i) => {
    const label = entry.shortcut ? `${entry.label} [${entry.shortcut}]` : entry.label;
    const selected = i === selection;
    const text = selected ? `► ${label} ◄` : `  ${label}  `;
    const style = selected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;
    const col = Math.max(1, anchor.col - Math.floor(text.length / 2));
    output += `\x1b[${anchor.row + i};${col}H${style}${text}\x1b[0m`;
  });

  return output;
}
