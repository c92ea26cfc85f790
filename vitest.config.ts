import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 测试环境
    environment: 'node',

    // 全局 API
    globals: true,

    // 包含的测试文件
    include: ['src/**/__tests__/**/*.test.ts'],

    // 排除
    exclude: ['node_modules', 'dist'],

    // PDF 渲染在 CI 上偶尔较慢
    testTimeout: 15000,
  },
});
