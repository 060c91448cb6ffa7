/**
 * Entity collections grouped by kind.
 *
 * Each game declares its kinds as a map from kind name to entity type, so
 * `list('food')` is typed as that game's food entity.
 */

import type { Entity } from './entities';

export type EntityKinds = Record<string, Entity>;

export type EntityGroups<M extends EntityKinds> = { [K in keyof M]: M[K][] };

export class EntityStore<M extends EntityKinds> {
  constructor(private readonly groups: EntityGroups<M>) {}

  /** Live list for a kind; mutations are seen by the store */
  list<K extends keyof M>(kind: K): M[K][] {
    return this.groups[kind];
  }

  add<K extends keyof M>(kind: K, entity: M[K]): void {
    this.groups[kind].push(entity);
  }

  remove<K extends keyof M>(kind: K, entity: M[K]): boolean {
    const list = this.groups[kind];
    const index = list.indexOf(entity);
    if (index === -1) return false;
    list.splice(index, 1);
    return true;
  }

  count(kind?: keyof M): number {
    if (kind !== undefined) return this.groups[kind].length;
    let total = 0;
    for (const [, list] of this.entries()) total += list.length;
    return total;
  }

  *entries(): Generator<[Extract<keyof M, string>, Entity[]]> {
    for (const kind in this.groups) {
      yield [kind, this.groups[kind]];
    }
  }

  /** Empties every list in place */
  clear(): void {
    for (const [, list] of this.entries()) list.length = 0;
  }
}
