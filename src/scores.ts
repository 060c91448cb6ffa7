/**
 * High-score commands
 *
 *   grid-arcade scores          Show the high-score table
 *   grid-arcade scores reset    Zero every high score (asks first)
 */

import * as p from '@clack/prompts';
import { GAME_NAMES } from './games/shared/constants';
import { JsonFileScoreStore, type ScoreTable } from './games/shared/scores';

/**
 * One line per game, names padded to a column
 */
export function formatScoreTable(table: ScoreTable): string {
  return GAME_NAMES.map((name) => `${name.padEnd(12)}${String(table[name]).padStart(8)}`).join('\n');
}

export async function scoresCommand(args: string[], store: JsonFileScoreStore): Promise<void> {
  const action = args.filter((a) => !a.startsWith('--'))[0];

  p.intro('grid-arcade');

  if (action === undefined || action === 'show') {
    p.note(formatScoreTable(store.all()), store.path);
    p.outro('Done.');
    return;
  }

  if (action !== 'reset') {
    p.log.error(`Unknown scores command: ${action}`);
    p.outro('Try: grid-arcade scores reset');
    process.exitCode = 1;
    return;
  }

  const confirmed = await p.confirm({
    message: `Reset all high scores in ${store.path}?`,
    initialValue: false,
  });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('Cancelled.');
    return;
  }

  store.resetAll();
  p.log.success('High scores reset.');
  p.outro('Done.');
}
