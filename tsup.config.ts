import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: {
      index: 'src/index.ts',
    },
    format: ['cjs', 'esm'],
    dts: true,
    splitting: false,
    sourcemap: false,
    clean: true,
  },
  {
    entry: {
      bin: 'src/bin.ts',
    },
    format: ['cjs'],
    splitting: false,
    sourcemap: false,
  },
]);
