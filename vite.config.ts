import path from 'path';
import { defineConfig } from 'vite';

// Browser bundles only; the server is compiled by tsc
export default defineConfig({
  publicDir: 'public',
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, 'shared'),
    },
  },
  build: {
    outDir: 'dist/public',
    emptyOutDir: false,
    rollupOptions: {
      input: {
        main: path.resolve(__dirname, 'src/client/indexEntry.ts'),
        viewer: path.resolve(__dirname, 'src/client/viewerEntry.ts'),
      },
      output: {
        entryFileNames: 'js/[name].js',
        chunkFileNames: 'js/[name]-[hash].js',
      },
    },
  },
});
