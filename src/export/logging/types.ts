/**
 * 导出日志类型定义
 *
 * 【设计原则】
 * - 只记录元信息（长度、数量、耗时），不记录文档正文
 * - 一次导出对应 started → succeeded / failed 两条事件
 */

import type { BlockKind } from '../../document/blocks';
import type { ExportFormat } from '../../format/types';

// ==========================================
// 日志事件类型
// ==========================================

/**
 * 日志阶段
 */
export type LogPhase = 'started' | 'succeeded' | 'failed';

/**
 * 导出请求元信息
 */
export interface RequestMeta {
  /** 导出 ID（同一次导出的事件共享） */
  exportId: string;

  /** 目标格式 */
  format: ExportFormat;

  /** 输入 HTML 长度 */
  htmlLength: number;

  /** 文件名预览（截断） */
  fileNamePreview?: string;
}

/**
 * 结果元信息
 */
export interface ResultMeta {
  /** Block 数量 */
  blockCount: number;

  /** 各类型 Block 数量 */
  blockKinds: Record<BlockKind, number>;

  /** 输出字节数 */
  byteLength: number;
}

/**
 * 导出日志事件
 */
export interface ExportLogEvent {
  /** 日志事件 ID */
  id: string;

  /** 时间戳 */
  timestamp: number;

  /** 阶段 */
  phase: LogPhase;

  /** 请求元信息 */
  requestMeta: RequestMeta;

  /** 处理耗时（毫秒，仅 succeeded/failed 阶段） */
  durationMs?: number;

  /** 结果元信息（仅 succeeded 阶段） */
  resultMeta?: ResultMeta;

  /** 错误信息（仅 failed 阶段） */
  error?: string;
}

// ==========================================
// 日志配置
// ==========================================

export interface ExportLoggerConfig {
  /** 是否启用日志 */
  enabled: boolean;

  /** 是否输出到控制台 */
  consoleOutput: boolean;

  /** 文件名预览最大长度 */
  previewMaxLength: number;
}

export const DEFAULT_LOGGER_CONFIG: ExportLoggerConfig = {
  enabled: true,
  consoleOutput: true,
  previewMaxLength: 40,
};

// ==========================================
// 工具函数
// ==========================================

/**
 * 生成日志事件 ID
 */
export function generateLogEventId(): string {
  return `log_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * 截断文本（用于预览）
 */
export function truncateForPreview(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength) + '...';
}
