import { defineConfig } from 'tsup';

export default defineConfig([
  // Core entry point
  {
    entry: { index: 'src/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    clean: true,
    outDir: 'dist',
  },
  // Format engine subpath export
  {
    entry: { format: 'src/format/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    outDir: 'dist',
  },
  // Logger subpath export
  {
    entry: { logger: 'src/logger/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    outDir: 'dist',
  },
  // Sinks subpath export
  {
    entry: { sinks: 'src/sinks/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    outDir: 'dist',
  },
]);
