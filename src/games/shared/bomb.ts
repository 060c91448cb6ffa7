/**
 * Bomb
 *
 * A rigid 4x4 cluster of cells: blinking corners, a solid core and shaded
 * edges. Bombs detonate when any target enters their footprint and destroy
 * every target within the blast zone around them.
 */

import { GRID_ROWS } from './constants';
import { type Direction, type Position, step, translate } from './geometry';
import { BlinkingCell, Cell, type Entity, type IdSequence, type Sprite } from './entities';

export const BOMB_SIZE = 4;
export const BLAST_RADIUS = 2;

type Offset = readonly [number, number];

const CORNERS: readonly Offset[] = [[0, 0], [3, 0], [0, 3], [3, 3]];
const CORE: readonly Offset[] = [[1, 1], [2, 1], [1, 2], [2, 2]];
const EDGES: readonly Offset[] = [
  [1, 0], [2, 0],
  [0, 1], [3, 1],
  [0, 2], [3, 2],
  [1, 3], [2, 3],
];

interface Member {
  offset: Offset;
  entity: Cell | BlinkingCell;
}

function at(anchor: Position, [dc, dr]: Offset): Position {
  return translate(anchor, dc, dr);
}

export class Bomb implements Entity {
  readonly variant = 'cluster';
  readonly id: number;
  private readonly members: Member[];

  constructor(ids: IdSequence, anchor: Position) {
    this.id = ids.nextId();
    this.members = [
      ...CORNERS.map((offset) => ({ offset, entity: new BlinkingCell(ids, at(anchor, offset)) })),
      ...CORE.map((offset) => ({ offset, entity: new Cell(ids, at(anchor, offset)) })),
      ...EDGES.map((offset) => ({ offset, entity: new Cell(ids, at(anchor, offset), { color: 'shade' }) })),
    ];
  }

  get position(): Position {
    return this.members[0].entity.position;
  }

  get direction(): Direction {
    return this.members[0].entity.direction;
  }

  get size(): number {
    return this.members.length;
  }

  update(tick: number, rate: number): void {
    for (const member of this.members) member.entity.update(tick, rate);
  }

  setPosition(anchor: Position): void {
    for (const member of this.members) member.entity.setPosition(at(anchor, member.offset));
  }

  setDirection(direction: Direction): void {
    for (const member of this.members) member.entity.setDirection(direction);
  }

  /** Moves all members one cell at once */
  step(direction: Direction): void {
    this.setPosition(step(this.position, direction));
  }

  footprint(): Position[] {
    return this.members.map((member) => member.entity.position);
  }

  covers(pos: Position): boolean {
    const { col, row } = this.position;
    return pos.col >= col && pos.col < col + BOMB_SIZE && pos.row >= row && pos.row < row + BOMB_SIZE;
  }

  inBlast(pos: Position): boolean {
    const { col, row } = this.position;
    return (
      pos.col >= col - BLAST_RADIUS &&
      pos.col < col + BOMB_SIZE + BLAST_RADIUS &&
      pos.row >= row - BLAST_RADIUS &&
      pos.row < row + BOMB_SIZE + BLAST_RADIUS
    );
  }

  sprites(): Sprite[] {
    return this.members.flatMap((member) =>
      member.entity.sprites().map((sprite) => ({ ...sprite, entityId: this.id })),
    );
  }
}

interface LiveBomb {
  bomb: Bomb;
  owner: Bomb[];
}

function removeItem<T>(list: T[], item: T): boolean {
  const index = list.indexOf(item);
  if (index === -1) return false;
  list.splice(index, 1);
  return true;
}

/**
 * Tracks every live bomb together with the entity list that owns it.
 */
export class BombRegistry {
  private readonly live: LiveBomb[] = [];

  get bombs(): Bomb[] {
    return this.live.map((entry) => entry.bomb);
  }

  get size(): number {
    return this.live.length;
  }

  spawn(ids: IdSequence, anchor: Position, owner: Bomb[]): Bomb {
    const bomb = new Bomb(ids, anchor);
    owner.push(bomb);
    this.live.push({ bomb, owner });
    return bomb;
  }

  /**
   * Steps every bomb and drops those that leave the grid.
   * Returns the bombs that exited.
   */
  moveAll(direction: Direction): Bomb[] {
    const exited: Bomb[] = [];
    for (const entry of [...this.live].reverse()) {
      entry.bomb.step(direction);
      const { row } = entry.bomb.position;
      const gone =
        (direction === 'up' && row < 0) ||
        (direction === 'down' && row >= GRID_ROWS - (BOMB_SIZE - 1));
      if (gone) {
        this.discard(entry);
        exited.push(entry.bomb);
      }
    }
    return exited;
  }

  checkExplosion(targets: readonly Entity[]): boolean {
    return this.detonations(targets).length > 0;
  }

  /** Indices of the bombs whose footprint holds at least one target */
  detonations(targets: readonly Entity[]): number[] {
    const hits: number[] = [];
    this.live.forEach((entry, index) => {
      if (targets.some((target) => entry.bomb.covers(target.position))) hits.push(index);
    });
    return hits;
  }

  /**
   * Destroys the bomb at `index` and every target inside its blast zone.
   * Returns the destroyed targets.
   */
  explode<T extends Entity>(targets: T[], index: number): T[] {
    const entry = this.live[index];
    if (!entry) return [];
    const destroyed = targets.filter((target) => entry.bomb.inBlast(target.position));
    for (const target of destroyed) removeItem(targets, target);
    this.discard(entry);
    return destroyed;
  }

  detonate<T extends Entity>(targets: T[]): T[] {
    const destroyed: T[] = [];
    for (const index of this.detonations(targets).reverse()) {
      destroyed.push(...this.explode(targets, index));
    }
    return destroyed;
  }

  /** Forgets every bomb owned by `owner` */
  release(owner: readonly Entity[]): void {
    for (const entry of [...this.live]) {
      if (entry.owner === owner) removeItem(this.live, entry);
    }
  }

  clear(): void {
    this.live.length = 0;
  }

  private discard(entry: LiveBomb): void {
    removeItem(this.live, entry);
    removeItem(entry.owner, entry.bomb);
  }
}
