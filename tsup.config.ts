import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    router: 'src/router/index.ts',
  },

  outDir: 'dist',

  format: ['esm'],
  target: 'node20',

  dts: true,
  sourcemap: true,
  clean: true,

  treeshake: true,
  splitting: false,
});
