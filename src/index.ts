/**
 * grid-arcade
 *
 * Snake, Breakout, Asteroids and Tetris on a 10x20 grid, for xterm.js and
 * the command line.
 *
 * Library usage (xterm.js):
 *   import { runGame, setTheme } from 'grid-arcade';
 *   setTheme('cyan');
 *   const controller = runGame('tetris', terminal);
 *
 * Headless usage:
 *   const game = new SnakeGame(new SimulationContext());
 *   game.tick(1);
 *
 * CLI usage:
 *   npx grid-arcade
 */

export * from './games';
