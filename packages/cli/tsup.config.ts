import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin.ts', 'src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  // workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@pubwatch\//],
});
