/**
 * Shared utilities for games
 *
 * Theme selection, alternate-buffer handling and layout helpers. The theme
 * is configured by the host via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import { type PhosphorMode, getAnsiColor, getShadeColor } from '../themes';

// ============================================================================
// Terminal Surface
// ============================================================================

export interface TerminalKeyEvent {
  key: string;
  domEvent: {
    key: string;
    preventDefault(): void;
    stopPropagation(): void;
  };
}

export interface Disposable {
  dispose(): void;
}

/**
 * The part of a terminal the games draw to and read keys from. An xterm.js
 * Terminal satisfies it, and so does the Node adapter in cli.ts.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  readonly element: object | null | undefined;
  write(data: string): void;
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
  onResize(listener: (size: { cols: number; rows: number }) => void): Disposable;
}

export type TerminalLike = Terminal | GameTerminal;

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: PhosphorMode = 'cyan';

export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

export function getCurrentShadeColor(): string {
  return getShadeColor(currentTheme);
}

// ============================================================================
// Alternate Buffer
// ============================================================================

/** Who put each terminal into the alternate buffer */
const bufferOwners = new WeakMap<GameTerminal, string>();

/**
 * A disposed xterm.js terminal loses its element; a Node surface has none
 * and reports `undefined`.
 */
export function isTerminalValid(terminal: GameTerminal | null | undefined): terminal is GameTerminal {
  if (!terminal) return false;
  try {
    return terminal.element !== null;
  } catch {
    return false;
  }
}

/**
 * Switch to the alternate buffer, hide the cursor and clear. Refuses a
 * terminal that is unusable or already switched by someone else.
 */
export function enterAlternateBuffer(terminal: GameTerminal, owner: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] ${owner}: terminal is not usable`);
    return false;
  }
  const current = bufferOwners.get(terminal);
  if (current !== undefined) {
    console.warn(`[AlternateBuffer] ${owner}: already held by ${current}`);
    return false;
  }

  terminal.write('\x1b[?1049h');
  terminal.write('\x1b[?25l');
  terminal.write('\x1b[2J\x1b[H');
  bufferOwners.set(terminal, owner);
  return true;
}

export function exitAlternateBuffer(terminal: GameTerminal, owner: string): boolean {
  if (!isTerminalValid(terminal) || !bufferOwners.has(terminal)) {
    console.warn(`[AlternateBuffer] ${owner}: nothing to leave`);
    return false;
  }

  terminal.write('\x1b[?1049l');
  terminal.write('\x1b[?25h');
  bufferOwners.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return bufferOwners.has(terminal);
}

export type { PhosphorMode } from '../themes';
