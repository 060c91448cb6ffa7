import { defineConfig } from 'tsup';

const shared = {
  format: ['esm' as const],
  target: 'node20',
  sourcemap: true,
  external: ['@xterm/xterm'],
};

export default defineConfig([
  // Library: games, host and score store for embedding
  {
    ...shared,
    entry: { index: 'src/index.ts' },
    dts: true,
    clean: true,
  },
  // Executable
  {
    ...shared,
    entry: { cli: 'src/cli.ts' },
    banner: { js: '#!/usr/bin/env node' },
  },
]);
