import { defineConfig } from 'vite'
import tsconfigPaths from 'vite-tsconfig-paths'

// The browser host's index.html lives in src/host/browser
export default defineConfig({
  root: 'src/host/browser',
  appType: 'spa',
  plugins: [tsconfigPaths({ root: process.cwd() })],
  build: {
    outDir: '../../../dist/web',
    emptyOutDir: true,
  },
  server: {
    open: true,
  },
})
