import { defineConfig, mergeConfig } from 'vitest/config';
import viteConfig from './vite.config';

// 테스트 설정 (Vitest)
export default mergeConfig(
  viteConfig,
  defineConfig({
    test: {
      globals: true,
      environment: 'node',
      include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
    },
  })
);
