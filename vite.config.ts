import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

export default defineConfig(({ mode }) => ({
  plugins: [react()],
  server: {
    port: 5173,
    strictPort: true // Fail if port is already in use instead of trying next port
  },
  define: {
    __VERBOSE_LOGS__: JSON.stringify(mode === 'development')
  }
}))
