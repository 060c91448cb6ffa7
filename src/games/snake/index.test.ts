import { describe, it, expect, vi, afterEach } from 'vitest';
import { SimulationContext } from '../shared/context';
import { MemoryScoreStore } from '../shared/scores';
import { SNAKE_START, SnakeGame, growthPoints } from './index';

function run(game: SnakeGame, from: number, to: number): void {
  for (let tick = from; tick <= to; tick++) game.tick(tick);
}

/** Random source pinned to 0: food lands on (0,0) */
function createGame() {
  const scores = new MemoryScoreStore();
  const context = new SimulationContext({ scores, random: () => 0 });
  return { game: new SnakeGame(context), scores };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('growthPoints', () => {
  it('scales with the length before eating', () => {
    expect(growthPoints(3)).toBe(0);
    expect(growthPoints(4)).toBe(15);
    expect(growthPoints(25)).toBe(15);
    expect(growthPoints(26)).toBe(45);
    expect(growthPoints(50)).toBe(45);
    expect(growthPoints(51)).toBe(100);
    expect(growthPoints(100)).toBe(100);
    expect(growthPoints(101)).toBe(250);
    expect(growthPoints(199)).toBe(250);
  });
});

describe('SnakeGame', () => {
  it('starts three cells long heading down', () => {
    const { game } = createGame();
    expect(game.body).toEqual(SNAKE_START);
    expect(game.direction).toBe('down');
    expect(game.food).toEqual({ col: 0, row: 0 });
  });

  it('moves ten times a second', () => {
    const { game } = createGame();
    run(game, 1, 5);
    expect(game.body[0]).toEqual({ col: 4, row: 5 });
    game.tick(6);
    expect(game.body).toEqual([
      { col: 4, row: 6 },
      { col: 4, row: 5 },
      { col: 4, row: 4 },
    ]);
  });

  it('grows on the food, scoring from the second meal', () => {
    const { game, scores } = createGame();
    game.placeFood({ col: 4, row: 6 });
    run(game, 1, 6);

    expect(game.body).toEqual([
      { col: 4, row: 6 },
      { col: 4, row: 5 },
      { col: 4, row: 4 },
      { col: 4, row: 3 },
    ]);
    expect(game.score).toBe(0);
    expect(game.food).toEqual({ col: 0, row: 0 });

    game.placeFood({ col: 4, row: 7 });
    run(game, 7, 12);
    expect(game.body).toHaveLength(5);
    expect(game.score).toBe(15);
    expect(game.highestScore).toBe(15);
    expect(scores.read('Snake')).toBe(15);
  });

  it('scans for a free cell when random picks keep hitting the body', () => {
    // Alternating draws always land on (4,5)
    let draw = 0;
    const context = new SimulationContext({ random: () => (draw++ % 2 === 0 ? 0.45 : 0.27) });
    const game = new SnakeGame(context);
    expect(game.food).toEqual({ col: 0, row: 0 });
  });

  it('ignores turns before the first move', () => {
    const { game } = createGame();
    game.handleInput('left', true);
    expect(game.direction).toBe('down');
  });

  it('takes one turn per move and never reverses', () => {
    const { game } = createGame();
    run(game, 1, 6);

    game.handleInput('up', true);
    expect(game.direction).toBe('down');
    game.handleInput('left', true);
    expect(game.direction).toBe('down');

    run(game, 7, 12);
    expect(game.body[0]).toEqual({ col: 4, row: 7 });
    game.handleInput('left', true);
    expect(game.direction).toBe('left');
  });

  it('doubles its speed while accelerating', () => {
    const { game } = createGame();
    game.handleInput('accelerate', true);
    game.handleInput('accelerate', true);
    run(game, 1, 6);
    expect(game.body[0]).toEqual({ col: 4, row: 7 });

    game.handleInput('accelerate', false);
    run(game, 7, 12);
    expect(game.body[0]).toEqual({ col: 4, row: 8 });
  });

  it('dies leaving the grid', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const { game } = createGame();
    run(game, 1, 84);
    expect(game.body[0]).toEqual({ col: 4, row: 19 });
    expect(game.isRunning()).toBe(true);

    run(game, 85, 90);
    expect(game.outcome).toBe('defeat');
    expect(game.isRunning()).toBe(false);
    expect(game.body).toEqual([]);
  });

  it('dies running into itself', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const { game } = createGame();
    game.placeFood({ col: 4, row: 6 });
    run(game, 1, 6);
    game.placeFood({ col: 4, row: 7 });
    run(game, 7, 12);
    expect(game.body).toHaveLength(5);

    game.handleInput('right', true);
    run(game, 13, 18);
    game.handleInput('up', true);
    run(game, 19, 24);
    game.handleInput('left', true);
    run(game, 25, 30);

    expect(game.outcome).toBe('defeat');
    expect(game.score).toBe(15);
  });

  it('starts over on confirm', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const { game } = createGame();
    run(game, 1, 90);
    game.handleInput('confirm', true);
    expect(game.isRunning()).toBe(true);
    expect(game.body).toEqual(SNAKE_START);
    expect(game.score).toBe(0);
    expect(game.direction).toBe('down');
  });

  it('reports its length', () => {
    const { game } = createGame();
    expect(game.snapshot().details).toEqual([{ label: 'LENGTH', value: '3' }]);
  });
});
