/**
 * 导出配置
 *
 * 集中管理导出相关的配置项，从环境变量读取（支持 .env 文件）。
 *
 * 【环境变量】
 * - EXPORT_PAGE_SIZE: 页面尺寸，A4 / LETTER（默认 A4）
 * - EXPORT_PAGE_MARGIN: 四边统一页边距，单位 pt（默认 72，即 1 英寸）
 * - EXPORT_PLACEHOLDER_TEXT: 空文档 PDF 的占位文本
 * - EXPORT_DOCUMENT_CREATOR: 写入文档元数据的创建者
 * - EXPORT_LOG_ENABLED: 是否输出导出日志（默认 true）
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';

import type { PackageRenderOptions, PrintRenderOptions } from '../format/types';
import { DEFAULT_CREATOR, DEFAULT_PAGE_LAYOUT, DEFAULT_PLACEHOLDER_TEXT } from '../format/types';

// ==========================================
// 类型定义
// ==========================================

/**
 * 导出配置接口
 */
export interface ExportConfig {
  /** docx 渲染选项 */
  package: PackageRenderOptions;

  /** pdf 渲染选项 */
  print: PrintRenderOptions;

  /** 是否启用导出日志 */
  logEnabled: boolean;
}

export class ExportConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string, public readonly issues?: unknown) {
    super(message);
    this.name = 'ExportConfigError';
  }
}

// ==========================================
// Schema
// ==========================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const exportEnvSchema = z.object({
  EXPORT_PAGE_SIZE: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['A4', 'LETTER']))
    .default(DEFAULT_PAGE_LAYOUT.pageSize),
  EXPORT_PAGE_MARGIN: z.coerce.number().nonnegative().max(200).default(DEFAULT_PAGE_LAYOUT.margin),
  EXPORT_PLACEHOLDER_TEXT: z.string().trim().min(1).default(DEFAULT_PLACEHOLDER_TEXT),
  EXPORT_DOCUMENT_CREATOR: z.string().trim().min(1).default(DEFAULT_CREATOR),
  EXPORT_LOG_ENABLED: booleanFlag.default('true'),
});

// ==========================================
// 加载
// ==========================================

/**
 * 从环境变量解析配置
 *
 * @param env - 环境变量（默认 process.env）
 * @throws ExportConfigError - 取值不合法
 */
export function loadExportConfig(env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const result = exportEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ExportConfigError('Invalid export configuration', result.error.flatten().fieldErrors);
  }

  const parsed = result.data;
  const layout = {
    pageSize: parsed.EXPORT_PAGE_SIZE,
    margin: parsed.EXPORT_PAGE_MARGIN,
    creator: parsed.EXPORT_DOCUMENT_CREATOR,
  };

  return {
    package: { ...layout },
    print: { ...layout, placeholderText: parsed.EXPORT_PLACEHOLDER_TEXT },
    logEnabled: parsed.EXPORT_LOG_ENABLED,
  };
}

let cachedConfig: ExportConfig | null = null;

/**
 * 获取进程级配置（首次调用时加载 .env）
 */
export function getExportConfig(): ExportConfig {
  if (!cachedConfig) {
    dotenv.config();
    cachedConfig = loadExportConfig(process.env);
  }
  return cachedConfig;
}

/**
 * 清除缓存（测试用）
 */
export function resetExportConfig(): void {
  cachedConfig = null;
}
