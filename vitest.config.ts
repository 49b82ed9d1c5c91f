import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      // 워크스페이스 패키지를 소스 파일로 직접 참조 (빌드 없이 테스트)
      '@progress-hud/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@progress-hud/react': resolve(__dirname, 'packages/react/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
});
