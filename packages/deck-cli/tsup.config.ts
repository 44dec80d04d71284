import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['esm'],
  target: 'node20',
  clean: true,
  // core is a private workspace package and ships inside the binary
  noExternal: ['@deckwright/core'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
