import { describe, it, expect } from 'vitest';
import type { GameSnapshot } from './game';
import { boardCenter, boardLayout, renderFrame } from './render';

const palette = { line: 'L', shade: 'S' };
const layout = { left: 1, top: 1 };

function snapshot(overrides: Partial<GameSnapshot> = {}): GameSnapshot {
  return {
    name: 'Snake',
    phase: 'running',
    score: 120,
    highestScore: 300,
    cells: [],
    details: [],
    preview: [],
    ...overrides,
  };
}

describe('boardLayout', () => {
  it('centers board and panel', () => {
    expect(boardLayout(80, 24)).toEqual({ left: 23, top: 2 });
  });

  it('clamps to the top-left corner on small terminals', () => {
    expect(boardLayout(20, 10)).toEqual({ left: 1, top: 1 });
  });

  it('finds the middle of the board', () => {
    expect(boardCenter({ left: 1, top: 1 })).toEqual({ row: 12, col: 12 });
  });
});

describe('renderFrame', () => {
  it('draws the border', () => {
    const frame = renderFrame(snapshot(), layout, palette);
    expect(frame.startsWith(`\x1b[1;1HL╔${'══'.repeat(10)}╗\x1b[0m`)).toBe(true);
    expect(frame).toContain(`\x1b[22;1HL╚${'══'.repeat(10)}╝\x1b[0m`);
  });

  it('draws cells two columns wide in their color', () => {
    const frame = renderFrame(
      snapshot({
        cells: [
          { kind: 'body', entityId: 1, position: { col: 0, row: 0 }, color: 'line' },
          { kind: 'food', entityId: 2, position: { col: 1, row: 0 }, color: 'shade' },
        ],
      }),
      layout,
      palette,
    );
    expect(frame).toContain(
      `\x1b[2;1HL║\x1b[0mL██\x1b[0mS▒▒\x1b[0m${'  '.repeat(8)}L║\x1b[0m`,
    );
  });

  it('prefers a solid cell over a shaded one on the same spot', () => {
    const frame = renderFrame(
      snapshot({
        cells: [
          { kind: 'a', entityId: 1, position: { col: 9, row: 19 }, color: 'line' },
          { kind: 'b', entityId: 2, position: { col: 9, row: 19 }, color: 'shade' },
        ],
      }),
      layout,
      palette,
    );
    expect(frame).toContain(`\x1b[21;1HL║\x1b[0m${'  '.repeat(9)}L██\x1b[0mL║\x1b[0m`);
  });

  it('shows name and scores in the side panel', () => {
    const frame = renderFrame(snapshot(), layout, palette);
    expect(frame).toContain('\x1b[2;25HL│ SNAKE    │\x1b[0m');
    expect(frame).toContain('\x1b[5;25HL│      120 │\x1b[0m');
    expect(frame).toContain('\x1b[7;25HL│      300 │\x1b[0m');
  });

  it('lists per-game details', () => {
    const frame = renderFrame(snapshot({ details: [{ label: 'LENGTH', value: '4' }] }), layout, palette);
    expect(frame).toContain('\x1b[8;25HL│ LENGTH   │\x1b[0m');
    expect(frame).toContain('\x1b[9;25HL│        4 │\x1b[0m');
  });

  it('draws the preview below the panel', () => {
    const frame = renderFrame(snapshot({ preview: [{ col: 0, row: 0 }] }), layout, palette);
    expect(frame).toContain('\x1b[10;25HLNEXT\x1b[0m');
    expect(frame).toContain('\x1b[11;25HL██\x1b[0m');
  });

  it('adds a banner when paused or over', () => {
    expect(renderFrame(snapshot({ phase: 'paused' }), layout, palette)).toContain(
      '\x1b[9;8H\x1b[1;7mL PAUSED \x1b[0m',
    );
    expect(renderFrame(snapshot({ phase: 'defeat' }), layout, palette)).toContain(' GAME OVER ');
    expect(renderFrame(snapshot(), layout, palette)).not.toContain(' PAUSED ');
  });
});
