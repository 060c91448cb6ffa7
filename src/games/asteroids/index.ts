/**
 * Asteroids
 *
 * Rocks fall from the top at a slowly rising density while the ship on the
 * bottom row shoots upward. Bombs occasionally rise from the floor and clear
 * an 8x8 area when a rock runs into them. There is no victory: the game ends
 * when a rock reaches the ship's row.
 */

import { GRID_COLS, GRID_ROWS, TICKS_PER_SECOND } from '../shared/constants';
import type { SimulationContext } from '../shared/context';
import { BOMB_SIZE, type Bomb } from '../shared/bomb';
import { Cell } from '../shared/entities';
import { Game, type GameDetail } from '../shared/game';
import { type Direction, type Position, DIRECTION_VECTORS, samePosition, translate } from '../shared/geometry';
import type { GameKey } from '../shared/keys';
import { isActionTick } from '../shared/scheduler';

export interface AsteroidsOptions {
  /** Rock fall rate per second (default 2) */
  fallRate?: number;
  /** Shots per second (default 10) */
  fireRate?: number;
  /** Ship moves per second while steering (default 10) */
  shooterMoveRate?: number;
  /** Spawn bombs from the floor (default true) */
  bombs?: boolean;
}

type AsteroidsEntities = {
  asteroid: Cell;
  bullet: Cell;
  shooter: Cell;
  bomb: Bomb;
};

/** Game ticks until spawn density stops rising */
export const RAMP_TICKS = 180 * TICKS_PER_SECOND;
export const POINTS_PER_ASTEROID = 5;
export const SHOOTER_START: Position = { col: 4, row: GRID_ROWS - 1 };

/**
 * Chance that a column spawns a rock on a fall tick
 */
export function spawnProbability(gameTicks: number): number {
  if (gameTicks >= RAMP_TICKS) return 0.45;
  return 0.3 + (0.15 * gameTicks) / RAMP_TICKS;
}

/**
 * Chance that a bomb spawns on a fire tick
 */
export function bombSpawnProbability(gameTicks: number): number {
  const base = 1 / 3000;
  return gameTicks >= RAMP_TICKS ? base + 1 / 6000 : base;
}

export class AsteroidsGame extends Game<AsteroidsEntities> {
  private readonly fireRate: number;
  private readonly shooterMoveRate: number;
  private readonly useBombs: boolean;
  private readonly fallRate: number;
  private gameTicks = 0;
  private shooterDirection: Direction = 'none';

  constructor(context: SimulationContext, options: AsteroidsOptions = {}) {
    super('Asteroids', context, { asteroid: [], bullet: [], shooter: [], bomb: [] });
    this.fallRate = options.fallRate ?? 2;
    this.fireRate = options.fireRate ?? 10;
    this.shooterMoveRate = options.shooterMoveRate ?? 10;
    this.useBombs = options.bombs ?? true;
    this.setup();
  }

  get asteroids(): Position[] {
    return this.entities.list('asteroid').map((rock) => rock.position);
  }

  get bullets(): Position[] {
    return this.entities.list('bullet').map((bullet) => bullet.position);
  }

  get shooter(): Position | null {
    const [ship] = this.entities.list('shooter');
    return ship ? ship.position : null;
  }

  get bombCount(): number {
    return this.entities.count('bomb');
  }

  get elapsedTicks(): number {
    return this.gameTicks;
  }

  rateOf(kind: keyof AsteroidsEntities): number {
    switch (kind) {
      case 'bullet':
        return TICKS_PER_SECOND;
      case 'shooter':
        return this.shooterMoveRate;
      default:
        return this.speed;
    }
  }

  checkVictory(): boolean {
    return false;
  }

  checkDefeat(): boolean {
    const rocks = this.asteroids;
    const ship = this.shooter;
    if (ship && rocks.some((rock) => samePosition(rock, ship))) return true;
    const lowest = Math.max(1, ...rocks.map((rock) => rock.row));
    return lowest >= GRID_ROWS;
  }

  protected setup(): void {
    this.speed = this.fallRate;
    this.gameTicks = 0;
    this.shooterDirection = 'none';
    this.entities.add('shooter', new Cell(this.context, SHOOTER_START));
  }

  protected onKey(key: GameKey, isPress: boolean): void {
    if (key !== 'left' && key !== 'right') return;
    if (isPress) {
      this.shooterDirection = key;
    } else if (this.shooterDirection === key) {
      this.shooterDirection = 'none';
    }
  }

  protected step(tick: number): void {
    this.gameTicks += 1;

    const hits = this.checkHits();
    if (hits > 0) {
      this.score += hits * POINTS_PER_ASTEROID;
      this.updateScore();
    }
    this.despawnBullets();

    if (isActionTick(tick, this.fallRate)) {
      this.dropAsteroids();
      this.context.bombs.moveAll('up');
      this.context.bombs.detonate(this.entities.list('asteroid'));
    }
    if (isActionTick(tick, this.fireRate)) {
      this.shoot();
      this.maybeSpawnBomb();
    }
    if (isActionTick(tick, this.shooterMoveRate)) {
      this.moveShooter();
    }
  }

  protected details(): GameDetail[] {
    return [{ label: 'TIME', value: `${Math.floor(this.gameTicks / TICKS_PER_SECOND)}s` }];
  }

  /**
   * Removes every rock sitting on or just above a bullet, with the bullets
   * that struck. Returns the number of rocks destroyed.
   */
  private checkHits(): number {
    const rocks = this.entities.list('asteroid');
    const bullets = this.entities.list('bullet');
    const destroyed = new Set<Cell>();
    const spent: Cell[] = [];

    for (const bullet of bullets) {
      const { col, row } = bullet.position;
      const struck = rocks.filter(
        (rock) => rock.position.col === col && (rock.position.row === row || rock.position.row === row + 1),
      );
      if (struck.length === 0) continue;
      spent.push(bullet);
      for (const rock of struck) destroyed.add(rock);
    }

    for (const bullet of spent) this.entities.remove('bullet', bullet);
    for (const rock of destroyed) this.entities.remove('asteroid', rock);
    return destroyed.size;
  }

  private despawnBullets(): void {
    for (const bullet of [...this.entities.list('bullet')]) {
      if (bullet.position.row < 0) this.entities.remove('bullet', bullet);
    }
  }

  private dropAsteroids(): void {
    for (const rock of this.entities.list('asteroid')) {
      rock.setPosition(translate(rock.position, 0, 1));
    }
    const p = spawnProbability(this.gameTicks);
    for (let col = 0; col < GRID_COLS; col++) {
      if (this.context.chance(p)) {
        this.entities.add('asteroid', new Cell(this.context, { col, row: 0 }));
      }
    }
  }

  private shoot(): void {
    const ship = this.shooter;
    if (!ship) return;
    this.entities.add('bullet', new Cell(this.context, ship, { direction: 'up' }));
  }

  private maybeSpawnBomb(): void {
    if (!this.useBombs || !this.context.chance(bombSpawnProbability(this.gameTicks))) return;
    const col = this.context.randomInt(0, GRID_COLS - BOMB_SIZE);
    this.context.bombs.spawn(this.context, { col, row: GRID_ROWS - 1 }, this.entities.list('bomb'));
  }

  private moveShooter(): void {
    const [ship] = this.entities.list('shooter');
    const { dx } = DIRECTION_VECTORS[this.shooterDirection];
    if (!ship || dx === 0) return;
    const col = ship.position.col + dx;
    if (col >= 0 && col < GRID_COLS) ship.setPosition({ col, row: ship.position.row });
  }
}
