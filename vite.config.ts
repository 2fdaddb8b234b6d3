import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'
import tailwindcss from 'tailwindcss'
import autoprefixer from 'autoprefixer'

const frontendRoot = fileURLToPath(new URL('./src/frontend', import.meta.url))
const tailwindConfig = fileURLToPath(new URL('./tailwind.config.ts', import.meta.url))

export default defineConfig({
  root: frontendRoot,
  plugins: [react()],
  css: {
    postcss: {
      plugins: [tailwindcss({ config: tailwindConfig }), autoprefixer()],
    },
  },
  build: {
    outDir: fileURLToPath(new URL('./dist', import.meta.url)),
    emptyOutDir: true,
  },
  server: {
    port: 3000,
  },
})
