/**
 * Ball collision rules, kept free of game state for testing.
 */

import { GRID_COLS } from '../shared/constants';
import { type Position, type Vector, samePosition, translate } from '../shared/geometry';

export interface BrickHit {
  velocity: Vector;
  destroyed: Position[];
}

/**
 * Resolves the ball against the bricks around it. Side and vertical
 * neighbours take priority over the diagonal one.
 */
export function resolveBrickHit(
  ball: Position,
  velocity: Vector,
  hasBrick: (pos: Position) => boolean,
): BrickHit {
  const { dx, dy } = velocity;
  const side = translate(ball, dx, 0);
  const vertical = translate(ball, 0, dy);
  const diagonal = translate(ball, dx, dy);
  const sideHit = hasBrick(side);
  const verticalHit = hasBrick(vertical);

  if (sideHit && verticalHit) {
    const destroyed = [side, vertical];
    if (hasBrick(diagonal)) destroyed.push(diagonal);
    return { velocity: { dx: -dx, dy: -dy }, destroyed };
  }
  if (sideHit) return { velocity: { dx: -dx, dy }, destroyed: [side] };
  if (verticalHit) return { velocity: { dx, dy: -dy }, destroyed: [vertical] };
  if (hasBrick(diagonal)) return { velocity: { dx: -dx, dy: -dy }, destroyed: [diagonal] };
  return { velocity, destroyed: [] };
}

/**
 * Bounces off the side walls and the ceiling; the floor stays open
 */
export function reflectFromBorders(ball: Position, velocity: Vector): Vector {
  let { dx, dy } = velocity;
  if ((ball.col <= 0 && dx < 0) || (ball.col >= GRID_COLS - 1 && dx > 0)) dx = -dx;
  if (ball.row <= 0 && dy < 0) dy = -dy;
  return { dx, dy };
}

/**
 * New velocity when the ball strikes the paddle, or null on a miss.
 * The outer segments steer the ball outward; the rest keep its course.
 */
export function reflectFromPaddle(ball: Position, velocity: Vector, paddle: readonly Position[]): Vector | null {
  const ahead = translate(ball, 0, velocity.dy);
  const diagonal = translate(ball, velocity.dx, velocity.dy);
  const struck = paddle.find((seg) => samePosition(seg, ahead)) ?? paddle.find((seg) => samePosition(seg, diagonal));
  if (!struck) return null;

  let dx = velocity.dx;
  if (samePosition(struck, paddle[0])) {
    dx = -1;
  } else if (samePosition(struck, paddle[paddle.length - 1])) {
    dx = 1;
  }
  return { dx, dy: -1 };
}
