import { describe, it, expect } from 'vitest';
import { type Position, positionKey } from '../shared/geometry';
import { reflectFromBorders, reflectFromPaddle, resolveBrickHit } from './collision';

function bricks(...cells: Position[]) {
  const set = new Set(cells.map(positionKey));
  return (pos: Position) => set.has(positionKey(pos));
}

describe('resolveBrickHit', () => {
  const ball = { col: 5, row: 5 };
  const velocity = { dx: 1, dy: -1 };

  it('bounces straight back from an inside corner', () => {
    const hit = resolveBrickHit(ball, velocity, bricks({ col: 6, row: 5 }, { col: 5, row: 4 }));
    expect(hit.velocity).toEqual({ dx: -1, dy: 1 });
    expect(hit.destroyed).toEqual([
      { col: 6, row: 5 },
      { col: 5, row: 4 },
    ]);
  });

  it('takes the diagonal brick along in a corner', () => {
    const hit = resolveBrickHit(
      ball,
      velocity,
      bricks({ col: 6, row: 5 }, { col: 5, row: 4 }, { col: 6, row: 4 }),
    );
    expect(hit.destroyed).toHaveLength(3);
  });

  it('flips horizontally on a side hit', () => {
    const hit = resolveBrickHit(ball, velocity, bricks({ col: 6, row: 5 }, { col: 6, row: 4 }));
    expect(hit.velocity).toEqual({ dx: -1, dy: -1 });
    expect(hit.destroyed).toEqual([{ col: 6, row: 5 }]);
  });

  it('flips vertically on a top hit', () => {
    const hit = resolveBrickHit(ball, velocity, bricks({ col: 5, row: 4 }));
    expect(hit.velocity).toEqual({ dx: 1, dy: 1 });
    expect(hit.destroyed).toEqual([{ col: 5, row: 4 }]);
  });

  it('reverses on a lone diagonal brick', () => {
    const hit = resolveBrickHit(ball, velocity, bricks({ col: 6, row: 4 }));
    expect(hit.velocity).toEqual({ dx: -1, dy: 1 });
    expect(hit.destroyed).toEqual([{ col: 6, row: 4 }]);
  });

  it('keeps going with nothing around', () => {
    const hit = resolveBrickHit(ball, velocity, bricks({ col: 4, row: 6 }));
    expect(hit.velocity).toEqual(velocity);
    expect(hit.destroyed).toEqual([]);
  });

  it('keeps both components at one cell per move', () => {
    const around = [
      { col: 6, row: 5 },
      { col: 5, row: 4 },
      { col: 6, row: 4 },
    ];
    for (let mask = 0; mask < 8; mask++) {
      const present = around.filter((_, i) => mask & (1 << i));
      const hit = resolveBrickHit(ball, velocity, bricks(...present));
      expect(Math.abs(hit.velocity.dx)).toBe(1);
      expect(Math.abs(hit.velocity.dy)).toBe(1);
    }
  });
});

describe('reflectFromBorders', () => {
  it('bounces off the side walls', () => {
    expect(reflectFromBorders({ col: 0, row: 5 }, { dx: -1, dy: 1 })).toEqual({ dx: 1, dy: 1 });
    expect(reflectFromBorders({ col: 9, row: 5 }, { dx: 1, dy: -1 })).toEqual({ dx: -1, dy: -1 });
  });

  it('bounces off the ceiling', () => {
    expect(reflectFromBorders({ col: 5, row: 0 }, { dx: 1, dy: -1 })).toEqual({ dx: 1, dy: 1 });
    expect(reflectFromBorders({ col: 0, row: 0 }, { dx: -1, dy: -1 })).toEqual({ dx: 1, dy: 1 });
  });

  it('leaves the floor open', () => {
    expect(reflectFromBorders({ col: 5, row: 19 }, { dx: 1, dy: 1 })).toEqual({ dx: 1, dy: 1 });
  });

  it('ignores a wall the ball is moving away from', () => {
    expect(reflectFromBorders({ col: 0, row: 5 }, { dx: 1, dy: 1 })).toEqual({ dx: 1, dy: 1 });
  });
});

describe('reflectFromPaddle', () => {
  const paddle = [
    { col: 3, row: 19 },
    { col: 4, row: 19 },
    { col: 5, row: 19 },
  ];

  it('keeps the course off the middle segment', () => {
    expect(reflectFromPaddle({ col: 4, row: 18 }, { dx: 1, dy: 1 }, paddle)).toEqual({ dx: 1, dy: -1 });
  });

  it('steers outward off the end segments', () => {
    expect(reflectFromPaddle({ col: 3, row: 18 }, { dx: 1, dy: 1 }, paddle)).toEqual({ dx: -1, dy: -1 });
    expect(reflectFromPaddle({ col: 5, row: 18 }, { dx: -1, dy: 1 }, paddle)).toEqual({ dx: 1, dy: -1 });
  });

  it('catches the ball coming in diagonally', () => {
    expect(reflectFromPaddle({ col: 2, row: 18 }, { dx: 1, dy: 1 }, paddle)).toEqual({ dx: -1, dy: -1 });
  });

  it('misses a ball beside the paddle', () => {
    expect(reflectFromPaddle({ col: 0, row: 18 }, { dx: -1, dy: 1 }, paddle)).toBeNull();
  });
});
