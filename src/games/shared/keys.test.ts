import { describe, it, expect } from 'vitest';
import { mapKey } from './keys';

describe('mapKey', () => {
  it('maps arrows and WASD for every game', () => {
    expect(mapKey('Snake', 'ArrowUp')).toBe('up');
    expect(mapKey('Tetris', 'ArrowLeft')).toBe('left');
    expect(mapKey('Breakout', 'd')).toBe('right');
    expect(mapKey('Asteroids', 's')).toBe('down');
  });

  it('maps the shared control keys', () => {
    expect(mapKey('Snake', 'Enter')).toBe('confirm');
    expect(mapKey('Snake', 'P')).toBe('pause');
    expect(mapKey('Tetris', 'Backspace')).toBe('menu');
    expect(mapKey('Breakout', 'm')).toBe('menu');
  });

  it('gives space a meaning per game', () => {
    expect(mapKey('Snake', ' ')).toBe('accelerate');
    expect(mapKey('Breakout', ' ')).toBe('accelerate');
    expect(mapKey('Tetris', ' ')).toBe('drop');
    expect(mapKey('Asteroids', ' ')).toBeNull();
  });

  it('only lets Tetris hold', () => {
    expect(mapKey('Tetris', 'c')).toBe('hold');
    expect(mapKey('Tetris', 'C')).toBe('hold');
    expect(mapKey('Snake', 'c')).toBeNull();
  });

  it('returns null for unbound keys', () => {
    expect(mapKey('Snake', 'x')).toBeNull();
    expect(mapKey('Snake', 'constructor')).toBeNull();
  });
});
