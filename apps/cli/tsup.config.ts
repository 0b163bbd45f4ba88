import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  dts: false,
  target: 'node20',
  platform: 'node',
  // Bundle @refmt/core but keep micromatch external (it has dynamic requires)
  noExternal: [/^@refmt\//],
  external: ['micromatch'],
});
