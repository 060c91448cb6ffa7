/**
 * Breakout
 *
 * Three brick layouts cleared in order. The ball starts on the paddle and
 * launches with the accelerate key; losing it past the bottom row ends the
 * game.
 */

import { GRID_COLS, GRID_ROWS } from '../shared/constants';
import type { SimulationContext } from '../shared/context';
import { Cell } from '../shared/entities';
import { Game, type GameDetail } from '../shared/game';
import {
  type Direction,
  type Position,
  type Vector,
  DIRECTION_VECTORS,
  positionKey,
  samePosition,
  translate,
} from '../shared/geometry';
import type { GameKey } from '../shared/keys';
import { isActionTick } from '../shared/scheduler';
import { reflectFromBorders, reflectFromPaddle, resolveBrickHit } from './collision';
import { BRICK_POINTS, LEVELS, levelBonus, levelBricks } from './levels';

export interface BreakoutOptions {
  /** Ball moves per second before acceleration (default 20) */
  startSpeed?: number;
  /** Paddle width in cells (default 3) */
  paddleSize?: number;
}

type BreakoutEntities = {
  brick: Cell;
  paddle: Cell;
  ball: Cell;
};

export const BALL_START: Position = { col: 4, row: 18 };
export const LAUNCH_VELOCITY: Vector = { dx: 1, dy: -1 };

export class BreakoutGame extends Game<BreakoutEntities> {
  level = 1;
  private readonly startSpeed: number;
  private readonly paddleSize: number;
  private bricks = new Map<string, Cell>();
  private velocity: Vector = { dx: 0, dy: 0 };
  private attached = true;
  private dragging = false;
  private paddleDirection: Direction = 'none';
  private accelerating = false;
  private brokenThisLevel = 0;

  constructor(context: SimulationContext, options: BreakoutOptions = {}) {
    super('Breakout', context, { brick: [], paddle: [], ball: [] });
    this.startSpeed = options.startSpeed ?? 20;
    this.paddleSize = Math.min(GRID_COLS, Math.max(1, options.paddleSize ?? 3));
    this.setup();
  }

  get ball(): Position | null {
    const [ball] = this.entities.list('ball');
    return ball ? ball.position : null;
  }

  get ballVelocity(): Vector {
    return { ...this.velocity };
  }

  get paddle(): Position[] {
    return this.entities.list('paddle').map((seg) => seg.position);
  }

  get brickCount(): number {
    return this.bricks.size;
  }

  get isAttached(): boolean {
    return this.attached;
  }

  get isDragging(): boolean {
    return this.dragging;
  }

  hasBrick(pos: Position): boolean {
    return this.bricks.has(positionKey(pos));
  }

  checkVictory(): boolean {
    return this.level > LEVELS.length;
  }

  checkDefeat(): boolean {
    const ball = this.ball;
    return ball !== null && ball.row > GRID_ROWS - 1;
  }

  protected setup(): void {
    this.level = 1;
    this.speed = this.startSpeed;
    this.accelerating = false;
    this.paddleDirection = 'none';
    this.buildLevel();
  }

  protected onKey(key: GameKey, isPress: boolean): void {
    if (key === 'accelerate') {
      if (isPress && !this.accelerating) {
        this.accelerating = true;
        this.speed *= 2;
      } else if (!isPress && this.accelerating) {
        this.accelerating = false;
        this.speed /= 2;
      }
      return;
    }
    if (key !== 'left' && key !== 'right') return;
    if (isPress) {
      this.paddleDirection = key;
    } else if (this.paddleDirection === key) {
      this.paddleDirection = 'none';
    }
  }

  protected step(tick: number): void {
    if (!isActionTick(tick, this.speed)) return;

    this.moveBall();
    this.hitBricks();
    if (this.advanceLevel()) return;
    this.reflectBorders();
    this.hitBricks();
    if (this.advanceLevel()) return;
    this.toggleDrag();
    this.reflectPaddle();
    this.reflectBorders();
    this.movePaddle();
  }

  protected details(): GameDetail[] {
    return [{ label: 'LEVEL', value: String(Math.min(this.level, LEVELS.length)) }];
  }

  /** Lays out the current level's bricks with a fresh paddle and ball */
  private buildLevel(): void {
    this.entities.clear();
    this.bricks = new Map();
    for (const pos of levelBricks(this.level)) {
      const brick = new Cell(this.context, pos);
      this.bricks.set(positionKey(pos), brick);
      this.entities.add('brick', brick);
    }

    const left = Math.floor((GRID_COLS - this.paddleSize) / 2);
    for (let i = 0; i < this.paddleSize; i++) {
      this.entities.add('paddle', new Cell(this.context, { col: left + i, row: GRID_ROWS - 1 }));
    }
    const ballCol = left + Math.floor(this.paddleSize / 2);
    this.entities.add('ball', new Cell(this.context, { col: ballCol, row: BALL_START.row }));

    this.velocity = { dx: 0, dy: 0 };
    this.attached = true;
    this.dragging = false;
    this.brokenThisLevel = 0;
  }

  private ballCell(): Cell | undefined {
    return this.entities.list('ball')[0];
  }

  private moveBall(): void {
    const ball = this.ballCell();
    if (!ball || this.attached || this.dragging) return;
    ball.setPosition(translate(ball.position, this.velocity.dx, this.velocity.dy));
  }

  private hitBricks(): void {
    const ball = this.ballCell();
    if (!ball || (this.velocity.dx === 0 && this.velocity.dy === 0)) return;

    const hit = resolveBrickHit(ball.position, this.velocity, (pos) => this.hasBrick(pos));
    this.velocity = hit.velocity;
    if (hit.destroyed.length === 0) return;

    for (const pos of hit.destroyed) this.destroyBrick(pos);
    this.brokenThisLevel += hit.destroyed.length;
    this.score += hit.destroyed.length * BRICK_POINTS[this.level - 1];
    this.updateScore();
  }

  protected destroyBrick(pos: Position): void {
    const key = positionKey(pos);
    const brick = this.bricks.get(key);
    if (!brick) return;
    this.bricks.delete(key);
    this.entities.remove('brick', brick);
  }

  /** Moves to the next layout once the bricks are gone */
  private advanceLevel(): boolean {
    if (this.bricks.size > 0 || this.level > LEVELS.length) return false;
    this.level += 1;
    this.score += levelBonus(this.level);
    this.updateScore();
    if (this.level <= LEVELS.length) {
      console.info(`[Breakout] Level ${this.level - 1} cleared`);
      this.buildLevel();
    }
    return true;
  }

  private reflectBorders(): void {
    const ball = this.ballCell();
    if (ball) this.velocity = reflectFromBorders(ball.position, this.velocity);
  }

  private toggleDrag(): void {
    const ball = this.ballCell();
    if (!ball || this.velocity.dy === 0) return;
    const next = translate(ball.position, 0, this.velocity.dy);
    if (this.paddle.some((seg) => samePosition(seg, next))) {
      this.dragging = !this.dragging;
    }
  }

  private reflectPaddle(): void {
    const ball = this.ballCell();
    if (!ball || this.dragging) return;
    const bounced = reflectFromPaddle(ball.position, this.velocity, this.paddle);
    if (bounced) this.velocity = bounced;
  }

  private movePaddle(): void {
    const { dx } = DIRECTION_VECTORS[this.paddleDirection];
    const segments = this.entities.list('paddle');
    const [first] = segments;
    if (dx !== 0 && first) {
      const left = first.position.col + dx;
      if (left >= 0 && left <= GRID_COLS - this.paddleSize) {
        for (const seg of segments) seg.setPosition(translate(seg.position, dx, 0));
        const ball = this.ballCell();
        if (ball && (this.attached || this.dragging)) {
          ball.setPosition(translate(ball.position, dx, 0));
        }
      }
    }

    if (this.accelerating && this.attached && this.brokenThisLevel === 0) {
      this.attached = false;
      this.velocity = { ...LAUNCH_VELOCITY };
    }
  }
}
