/**
 * Terminal color themes
 *
 * Each theme pairs a bright tone for solid cells and text with a dim tone
 * for shaded cells.
 */

export type PhosphorMode = 'cyan' | 'amber' | 'green' | 'white' | 'hotpink' | 'red';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** ANSI code for solid cells, borders and text */
  line: string;
  /** ANSI code for shaded cells */
  shade: string;
}

export const themes: Record<PhosphorMode, ThemeColors> = {
  cyan: { name: 'Cyan', line: '\x1b[96m', shade: '\x1b[36m' },
  amber: { name: 'Amber', line: '\x1b[93m', shade: '\x1b[33m' },
  green: { name: 'Phosphor', line: '\x1b[92m', shade: '\x1b[32m' },
  white: { name: 'Mono', line: '\x1b[97m', shade: '\x1b[90m' },
  hotpink: { name: 'Neon', line: '\x1b[95m', shade: '\x1b[35m' },
  red: { name: 'Alarm', line: '\x1b[91m', shade: '\x1b[31m' },
};

const THEME_MODES: readonly PhosphorMode[] = ['cyan', 'amber', 'green', 'white', 'hotpink', 'red'];

export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].line;
}

export function getShadeColor(mode: PhosphorMode): string {
  return themes[mode].shade;
}

export function getThemeModes(): PhosphorMode[] {
  return [...THEME_MODES];
}

export function isValidThemeMode(value: string): value is PhosphorMode {
  return THEME_MODES.some((mode) => mode === value);
}
