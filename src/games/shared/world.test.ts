import { describe, it, expect } from 'vitest';
import { SimulationContext } from './context';
import { BlinkingCell, Cell } from './entities';
import { EntityStore } from './world';

function createStore() {
  return new EntityStore<{ wall: Cell; light: BlinkingCell }>({ wall: [], light: [] });
}

describe('EntityStore', () => {
  it('adds, counts and removes by kind', () => {
    const ctx = new SimulationContext();
    const store = createStore();
    const wall = new Cell(ctx, { col: 0, row: 0 });
    store.add('wall', wall);
    store.add('light', new BlinkingCell(ctx, { col: 1, row: 1 }));

    expect(store.count('wall')).toBe(1);
    expect(store.count()).toBe(2);
    expect(store.remove('wall', wall)).toBe(true);
    expect(store.remove('wall', wall)).toBe(false);
    expect(store.count()).toBe(1);
  });

  it('lists kinds in declaration order', () => {
    const store = createStore();
    expect([...store.entries()].map(([kind]) => kind)).toEqual(['wall', 'light']);
  });

  it('clears lists in place', () => {
    const store = createStore();
    const walls = store.list('wall');
    store.add('wall', new Cell(new SimulationContext(), { col: 0, row: 0 }));
    store.clear();
    expect(walls).toHaveLength(0);
    expect(store.list('wall')).toBe(walls);
  });
});
