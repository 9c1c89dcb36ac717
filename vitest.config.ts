import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
      // 只统计引擎源码；CLI 入口与测试夹具不计入
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/__test__/**', 'src/cli/index.ts'],
    },
  },
});
