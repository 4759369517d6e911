import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'handlers/generate': 'src/handlers/generate.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false,
  external: ['pino', 'ulid', 'zod'],
  noExternal: ['@packets/shared'],
  minify: false,
  splitting: false,
});
