/**
 * 导出日志模块导出
 */

// 类型
export * from './types';

// Logger
export { ExportLogger } from './ExportLogger';
