import { describe, it, expect } from 'vitest';
import { getAnsiColor, getShadeColor, getThemeModes, isValidThemeMode } from './index';

describe('themes', () => {
  it('pairs a bright and a dim tone', () => {
    expect(getAnsiColor('green')).toBe('\x1b[92m');
    expect(getShadeColor('green')).toBe('\x1b[32m');
  });

  it('validates theme names', () => {
    expect(getThemeModes()).toEqual(['cyan', 'amber', 'green', 'white', 'hotpink', 'red']);
    expect(isValidThemeMode('amber')).toBe(true);
    expect(isValidThemeMode('purple')).toBe(false);
  });
});
