/**
 * Format 层类型定义
 *
 * 【层级职责】
 * Format 层负责：
 * - HTML → Block 解析
 * - Block → docx / pdf 渲染
 *
 * 【禁止事项】
 * - 不允许写文件或返回路径（只返回字节）
 * - 不允许读取全局配置（配置通过参数注入）
 * - 不允许修改传入的 Block
 */

// ==========================================
// 导出格式
// ==========================================

/**
 * 支持的导出格式
 */
export type ExportFormat = 'docx' | 'pdf';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['docx', 'pdf'];

/**
 * 各格式的 MIME 类型
 */
export const MIME_TYPES: Record<ExportFormat, string> = {
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pdf: 'application/pdf',
};

// ==========================================
// 渲染选项
// ==========================================

/**
 * 页面尺寸
 */
export type PageSize = 'A4' | 'LETTER';

/**
 * 页面布局（两个渲染器共用）
 */
export interface PageLayoutOptions {
  /** 页面尺寸 */
  pageSize: PageSize;
  /** 四边统一页边距（pt） */
  margin: number;
}

/**
 * 文档元信息
 */
export interface DocumentInfoOptions {
  /** 创建者 */
  creator: string;
  /** 标题（可选） */
  title?: string;
}

/**
 * docx 渲染选项
 */
export interface PackageRenderOptions extends PageLayoutOptions, DocumentInfoOptions {}

/**
 * pdf 渲染选项
 */
export interface PrintRenderOptions extends PageLayoutOptions, DocumentInfoOptions {
  /** 空文档时输出的占位段落文本 */
  placeholderText: string;
}

export const DEFAULT_PAGE_LAYOUT: PageLayoutOptions = {
  pageSize: 'A4',
  margin: 72,
};

export const DEFAULT_PLACEHOLDER_TEXT = 'This document is empty.';

export const DEFAULT_CREATOR = 'prose-export';

export const DEFAULT_PACKAGE_OPTIONS: PackageRenderOptions = {
  ...DEFAULT_PAGE_LAYOUT,
  creator: DEFAULT_CREATOR,
};

export const DEFAULT_PRINT_OPTIONS: PrintRenderOptions = {
  ...DEFAULT_PAGE_LAYOUT,
  creator: DEFAULT_CREATOR,
  placeholderText: DEFAULT_PLACEHOLDER_TEXT,
};

// ==========================================
// 错误类型
// ==========================================

/**
 * 标记解析错误
 */
export class MalformedMarkupError extends Error {
  readonly code = 'MALFORMED_MARKUP';

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'MalformedMarkupError';
  }
}

/**
 * 渲染失败错误
 */
export class RenderFailureError extends Error {
  readonly code = 'RENDER_FAILED';

  constructor(
    message: string,
    public readonly format: ExportFormat,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RenderFailureError';
  }
}

/**
 * 把任意抛出值转换为可读的错误信息
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
