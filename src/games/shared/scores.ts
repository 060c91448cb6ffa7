/**
 * High-score persistence
 *
 * Scores are best effort: a missing file starts at zero, an unreadable one
 * is reported once and left untouched, and write failures never reach the
 * game loop.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { GAME_NAMES, type GameName } from './constants';

export type ScoreTable = Record<GameName, number>;

export interface ScoreStore {
  read(name: GameName): number;
  write(name: GameName, score: number): void;
}

export const DEFAULT_SCORES_PATH = join(homedir(), '.grid-arcade', 'high-scores.json');

export function emptyScoreTable(): ScoreTable {
  return { Snake: 0, Breakout: 0, Asteroids: 0, Tetris: 0 };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a decoded score file. Unknown keys are ignored and absent games
 * read as zero.
 */
export function parseScoreTable(data: unknown): ScoreTable {
  if (!isRecord(data)) {
    throw new Error('score file must hold a JSON object');
  }
  const table = emptyScoreTable();
  for (const name of GAME_NAMES) {
    const value = data[name];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new Error(`invalid score for ${name}: ${JSON.stringify(value)}`);
    }
    table[name] = value;
  }
  return table;
}

export class MemoryScoreStore implements ScoreStore {
  private readonly table: ScoreTable;

  constructor(initial: Partial<ScoreTable> = {}) {
    this.table = { ...emptyScoreTable(), ...initial };
  }

  read(name: GameName): number {
    return this.table[name];
  }

  write(name: GameName, score: number): void {
    this.table[name] = score;
  }

  all(): ScoreTable {
    return { ...this.table };
  }
}

export class JsonFileScoreStore implements ScoreStore {
  private table: ScoreTable | null = null;
  private writable = true;

  constructor(readonly path: string = DEFAULT_SCORES_PATH) {}

  /** False once the file turned out unreadable */
  get isWritable(): boolean {
    this.load();
    return this.writable;
  }

  read(name: GameName): number {
    return this.load()[name];
  }

  write(name: GameName, score: number): void {
    this.load()[name] = score;
    this.flush();
  }

  all(): ScoreTable {
    return { ...this.load() };
  }

  /** Zeros every game and rewrites the file, even after a read failure */
  resetAll(): void {
    this.table = emptyScoreTable();
    this.writable = true;
    this.flush();
  }

  private load(): ScoreTable {
    if (this.table) return this.table;
    this.table = emptyScoreTable();
    if (!existsSync(this.path)) return this.table;
    try {
      this.table = parseScoreTable(JSON.parse(readFileSync(this.path, 'utf-8')));
    } catch (err) {
      console.warn(`[ScoreStore] Could not read ${this.path}, high scores will not be saved:`, err);
      this.writable = false;
    }
    return this.table;
  }

  private flush(): void {
    if (!this.writable || !this.table) return;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, JSON.stringify(this.table, null, 2) + '\n');
    } catch (err) {
      console.warn(`[ScoreStore] Failed to write ${this.path}:`, err);
    }
  }
}
