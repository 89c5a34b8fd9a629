import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'errors/index': 'src/errors/index.ts',
    'network/index': 'src/network/index.ts',
    'operations/index': 'src/operations/index.ts',
    'rpc/index': 'src/rpc/index.ts',
    'das/index': 'src/das/index.ts',
    'bubblegum/index': 'src/bubblegum/index.ts',
  },
  format: ['esm', 'cjs'],
  dts: true,
  sourcemap: false,
  clean: true,
  splitting: false,
  treeshake: true,
  external: ['@solana/web3.js', 'bs58'],
  esbuildOptions(options) {
    options.platform = 'node';
  },
});
