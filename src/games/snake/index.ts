/**
 * Snake
 *
 * The body grows by one cell each time the head lands on the food. Running
 * into a wall or into the body ends the game; filling 200 cells wins it.
 */

import { GRID_CELLS, GRID_COLS, GRID_ROWS } from '../shared/constants';
import type { SimulationContext } from '../shared/context';
import { BlinkingCell, Cell } from '../shared/entities';
import { Game, type GameDetail } from '../shared/game';
import {
  type Direction,
  type Position,
  isOnGrid,
  opposite,
  positionKey,
  samePosition,
  step,
} from '../shared/geometry';
import type { GameKey } from '../shared/keys';
import { isActionTick } from '../shared/scheduler';

export interface SnakeOptions {
  /** Moves per second (default 10) */
  speed?: number;
}

type SnakeEntities = {
  body: Cell;
  food: BlinkingCell;
};

export const SNAKE_START: readonly Position[] = [
  { col: 4, row: 5 },
  { col: 4, row: 4 },
  { col: 4, row: 3 },
];

const FOOD_ATTEMPTS = 100;

const STEERING: Partial<Record<GameKey, Direction>> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
};

/**
 * Points for eating while `length` cells long
 */
export function growthPoints(length: number): number {
  if (length <= 3) return 0;
  if (length <= 25) return 15;
  if (length <= 50) return 45;
  if (length <= 100) return 100;
  if (length < GRID_CELLS) return 250;
  return 0;
}

export class SnakeGame extends Game<SnakeEntities> {
  private readonly baseSpeed: number;
  private heading: Direction = 'down';
  private turnAllowed = false;
  private accelerating = false;

  constructor(context: SimulationContext, options: SnakeOptions = {}) {
    super('Snake', context, { body: [], food: [] });
    this.baseSpeed = options.speed ?? 10;
    this.setup();
  }

  /** Body cells, head first */
  get body(): Position[] {
    return this.entities.list('body').map((cell) => cell.position);
  }

  get food(): Position | null {
    const [food] = this.entities.list('food');
    return food ? food.position : null;
  }

  get direction(): Direction {
    return this.heading;
  }

  /** Moves the food to `pos`, for scripted boards */
  placeFood(pos: Position): void {
    const [food] = this.entities.list('food');
    if (food) food.setPosition(pos);
  }

  checkVictory(): boolean {
    return this.entities.count('body') >= GRID_CELLS;
  }

  checkDefeat(): boolean {
    const [head, ...rest] = this.body;
    if (!head) return false;
    return !isOnGrid(head) || rest.some((segment) => samePosition(segment, head));
  }

  protected setup(): void {
    this.speed = this.baseSpeed;
    this.heading = 'down';
    this.turnAllowed = false;
    this.accelerating = false;
    for (const pos of SNAKE_START) {
      this.entities.add('body', new Cell(this.context, pos));
    }
    const spot = this.freeCell() ?? { col: 0, row: 0 };
    this.entities.add('food', new BlinkingCell(this.context, spot));
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

    const wanted = STEERING[key];
    if (!isPress || !wanted || !this.turnAllowed) return;
    this.turnAllowed = false;
    if (wanted !== opposite(this.heading)) this.heading = wanted;
  }

  protected step(tick: number): void {
    if (!isActionTick(tick, this.speed)) return;
    this.advance();
    this.turnAllowed = true;
  }

  protected details(): GameDetail[] {
    return [{ label: 'LENGTH', value: String(this.entities.count('body')) }];
  }

  private advance(): void {
    const body = this.entities.list('body');
    const [head] = body;
    if (!head) return;
    const next = step(head.position, this.heading);
    body.unshift(new Cell(this.context, next));

    const food = this.food;
    if (food && samePosition(next, food)) {
      this.respawnFood();
      // Paid on the length before this move's growth
      this.score += growthPoints(body.length - 1);
      this.updateScore();
    } else {
      body.pop();
    }
  }

  private respawnFood(): void {
    const spot = this.freeCell();
    if (spot) this.placeFood(spot);
  }

  /** Random cell outside the body, or null when the board is full */
  private freeCell(): Position | null {
    const taken = new Set(this.body.map(positionKey));
    for (let attempt = 0; attempt < FOOD_ATTEMPTS; attempt++) {
      const pos = {
        col: this.context.randomInt(0, GRID_COLS - 1),
        row: this.context.randomInt(0, GRID_ROWS - 1),
      };
      if (!taken.has(positionKey(pos))) return pos;
    }
    for (let row = 0; row < GRID_ROWS; row++) {
      for (let col = 0; col < GRID_COLS; col++) {
        if (!taken.has(positionKey({ col, row }))) return { col, row };
      }
    }
    return null;
  }
}
