/**
 * Frame renderer
 *
 * Turns a game snapshot into one ANSI string: the bordered 10x20 board with
 * double-width cells, a side panel with score, high score, per-game details
 * and the next-piece preview, plus pause and game-over banners.
 */

import { GRID_COLS, GRID_ROWS } from './constants';
import type { CellColor } from './entities';
import type { GameSnapshot } from './game';
import { isOnGrid, positionKey } from './geometry';

export const BOARD_WIDTH = GRID_COLS * 2 + 2;
export const BOARD_HEIGHT = GRID_ROWS + 2;
const PANEL_GAP = 2;
const PANEL_WIDTH = 12;

const GLYPHS: Record<CellColor, string> = {
  line: '██',
  shade: '▒▒',
};

export interface BoardLayout {
  /** Screen column of the board's left border (1-based) */
  left: number;
  /** Screen row of the board's top border (1-based) */
  top: number;
}

export interface FramePalette {
  line: string;
  shade: string;
}

/**
 * Centers the board and its side panel in a terminal of the given size
 */
export function boardLayout(cols: number, rows: number): BoardLayout {
  const totalWidth = BOARD_WIDTH + PANEL_GAP + PANEL_WIDTH;
  return {
    left: Math.max(1, Math.floor((cols - totalWidth) / 2) + 1),
    top: Math.max(1, Math.floor((rows - BOARD_HEIGHT) / 2) + 1),
  };
}

function at(row: number, col: number): string {
  return `\x1b[${row};${col}H`;
}

function renderBoard(snapshot: GameSnapshot, layout: BoardLayout, palette: FramePalette): string {
  const { left, top } = layout;
  const occupied = new Map<string, CellColor>();
  for (const cell of snapshot.cells) {
    if (!isOnGrid(cell.position)) continue;
    const key = positionKey(cell.position);
    // A solid cell wins over a shaded one on the same spot
    if (occupied.get(key) !== 'line') occupied.set(key, cell.color);
  }

  let output = `${at(top, left)}${palette.line}╔${'══'.repeat(GRID_COLS)}╗\x1b[0m`;
  for (let row = 0; row < GRID_ROWS; row++) {
    let line = '';
    for (let col = 0; col < GRID_COLS; col++) {
      const color = occupied.get(positionKey({ col, row }));
      line += color ? `${palette[color]}${GLYPHS[color]}\x1b[0m` : '  ';
    }
    output += `${at(top + 1 + row, left)}${palette.line}║\x1b[0m${line}${palette.line}║\x1b[0m`;
  }
  output += `${at(top + GRID_ROWS + 1, left)}${palette.line}╚${'══'.repeat(GRID_COLS)}╝\x1b[0m`;
  return output;
}

function panelRow(label: string): string {
  return `│ ${label.padEnd(PANEL_WIDTH - 4)} │`;
}

function renderPanel(snapshot: GameSnapshot, layout: BoardLayout, palette: FramePalette): string {
  const x = layout.left + BOARD_WIDTH + PANEL_GAP;
  const rule = '─'.repeat(PANEL_WIDTH - 2);
  const lines = [
    `┌${rule}┐`,
    panelRow(snapshot.name.toUpperCase()),
    `├${rule}┤`,
    panelRow('SCORE'),
    panelRow(String(snapshot.score).padStart(PANEL_WIDTH - 4)),
    panelRow('HIGH'),
    panelRow(String(snapshot.highestScore).padStart(PANEL_WIDTH - 4)),
  ];
  for (const detail of snapshot.details) {
    lines.push(panelRow(detail.label), panelRow(detail.value.padStart(PANEL_WIDTH - 4)));
  }
  lines.push(`└${rule}┘`);

  let output = '';
  lines.forEach((text, i) => {
    output += `${at(layout.top + i, x)}${palette.line}${text}\x1b[0m`;
  });

  if (snapshot.preview.length > 0) {
    const previewTop = layout.top + lines.length + 1;
    output += `${at(previewTop, x)}${palette.line}NEXT\x1b[0m`;
    for (let row = 0; row < 4; row++) {
      output += `${at(previewTop + 1 + row, x)}${' '.repeat(8)}`;
    }
    for (const pos of snapshot.preview) {
      output += `${at(previewTop + 1 + pos.row, x + pos.col * 2)}${palette.line}${GLYPHS.line}\x1b[0m`;
    }
  }
  return output;
}

function bannerText(snapshot: GameSnapshot): string | null {
  switch (snapshot.phase) {
    case 'paused':
      return 'PAUSED';
    case 'victory':
      return 'YOU WIN';
    case 'defeat':
      return 'GAME OVER';
    default:
      return null;
  }
}

/**
 * Row and center column for overlays drawn over the board
 */
export function boardCenter(layout: BoardLayout): { row: number; col: number } {
  return {
    row: layout.top + Math.floor(BOARD_HEIGHT / 2),
    col: layout.left + Math.floor(BOARD_WIDTH / 2),
  };
}

export function renderFrame(snapshot: GameSnapshot, layout: BoardLayout, palette: FramePalette): string {
  let output = renderBoard(snapshot, layout, palette);
  output += renderPanel(snapshot, layout, palette);

  const banner = bannerText(snapshot);
  if (banner) {
    const center = boardCenter(layout);
    const text = ` ${banner} `;
    output += `${at(center.row - 3, center.col - Math.floor(text.length / 2))}\x1b[1;7m${palette.line}${text}\x1b[0m`;
  }
  return output;
}
