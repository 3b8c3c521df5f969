import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  build: {
    target: 'es2022',
    rollupOptions: {
      output: {
        manualChunks: {
          // Keep React and the chart/icon libraries apart from the spreadsheet parsers
          'vendor-core': ['react', 'react-dom', 'lucide-react', 'recharts'],
          'vendor-utils': ['xlsx', 'papaparse', '@noble/hashes'],
        }
      }
    }
  }
});
