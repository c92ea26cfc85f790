/**
 * DocumentExportService - 文档导出服务
 *
 * 【职责】
 * - 校验导出请求
 * - 去掉生成内容外层的代码围栏
 * - HTML → Block → docx / pdf
 * - 生成下载文件名和 MIME 类型
 * - 记录导出日志
 *
 * 【设计原则】
 * - 不抛异常：所有失败都转换为 { success: false } 结果
 * - 不写文件：字节交给调用方，保存位置和保留策略由调用方决定
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { ExportConfig } from '../config/exportConfig';
import { getExportConfig } from '../config/exportConfig';
import type { Block } from '../document/blocks';
import { countBlocksByKind } from '../document/blocks';
import { blocksToDocx } from '../format/docx/blocksToDocx';
import { htmlToBlocks } from '../format/html/htmlToBlocks';
import { blocksToPdf } from '../format/pdf/blocksToPdf';
import { stripFences } from '../format/text/stripFences';
import type { ExportFormat } from '../format/types';
import { EXPORT_FORMATS, MIME_TYPES, describeError } from '../format/types';
import { ExportLogger } from './logging/ExportLogger';
import type { RequestMeta } from './logging/types';

// ==========================================
// 类型定义
// ==========================================

export interface ExportRequest {
  /** 编辑器输出的 HTML */
  html: string;
  /** 目标格式 */
  format: ExportFormat;
  /** 期望的下载文件名（可选） */
  fileName?: string;
}

export interface ExportSuccess {
  success: true;
  message: string;
  format: ExportFormat;
  fileName: string;
  mimeType: string;
  data: Buffer;
  blockCount: number;
}

export interface ExportFailure {
  success: false;
  message: string;
  error: string;
  code: string;
}

export type ExportOutcome = ExportSuccess | ExportFailure;

export interface DocumentExportServiceDeps {
  config?: ExportConfig;
  logger?: ExportLogger;
}

const exportRequestSchema: z.ZodType<ExportRequest> = z.object({
  html: z.string(),
  format: z.enum(['docx', 'pdf']),
  fileName: z.string().max(255).optional(),
});

// ==========================================
// 文件名
// ==========================================

const UNSAFE_FILE_NAME_CHARS = /[<>:"|?*\u0000-\u001f]/g;

const KNOWN_EXTENSION = new RegExp(`\\.(${EXPORT_FORMATS.join('|')})$`, 'i');

/**
 * 生成下载文件名
 *
 * - 去掉路径部分和非法字符
 * - 扩展名统一为目标格式（Report.docx 导出 pdf → Report.pdf）
 * - 没有可用名称时使用 document_<uuid>.<ext>
 */
export function resolveExportFileName(requested: string | undefined, format: ExportFormat): string {
  const baseName = (requested ?? '')
    .split(/[\\/]/)
    .pop()
    ?.trim()
    .replace(UNSAFE_FILE_NAME_CHARS, '_')
    .replace(KNOWN_EXTENSION, '')
    .replace(/^\.+/, '')
    .trim();

  if (!baseName) {
    return `document_${uuidv4()}.${format}`;
  }
  return `${baseName}.${format}`;
}

// ==========================================
// DocumentExportService 类
// ==========================================

export class DocumentExportService {
  private readonly config: ExportConfig;
  private readonly logger: ExportLogger;

  constructor(deps: DocumentExportServiceDeps = {}) {
    this.config = deps.config ?? getExportConfig();
    this.logger = deps.logger ?? new ExportLogger({ enabled: this.config.logEnabled });
  }

  /**
   * 导出文档
   *
   * @param input - 导出请求（未经校验）
   */
  async exportDocument(input: unknown): Promise<ExportOutcome> {
    const parsed = exportRequestSchema.safeParse(input);
    if (!parsed.success) {
      return {
        success: false,
        message: 'Invalid export request',
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; '),
        code: 'INVALID_REQUEST',
      };
    }

    const request = parsed.data;
    const requestMeta: RequestMeta = {
      exportId: uuidv4(),
      format: request.format,
      htmlLength: request.html.length,
      ...(request.fileName !== undefined && { fileNamePreview: request.fileName }),
    };
    const startedAt = Date.now();
    this.logger.logStarted({ request: requestMeta });

    try {
      const blocks = htmlToBlocks(stripFences(request.html));
      const data = await this.render(blocks, request.format);
      const fileName = resolveExportFileName(request.fileName, request.format);

      this.logger.logSucceeded({
        request: requestMeta,
        durationMs: Date.now() - startedAt,
        result: {
          blockCount: blocks.length,
          blockKinds: countBlocksByKind(blocks),
          byteLength: data.length,
        },
      });

      return {
        success: true,
        message: 'Document exported successfully',
        format: request.format,
        fileName,
        mimeType: MIME_TYPES[request.format],
        data,
        blockCount: blocks.length,
      };
    } catch (error) {
      const message = describeError(error);
      this.logger.logFailed({
        request: requestMeta,
        durationMs: Date.now() - startedAt,
        error: message,
      });

      return {
        success: false,
        message: 'Failed to export document',
        error: message,
        code: errorCode(error),
      };
    }
  }

  /**
   * 按格式选择渲染器
   */
  render(blocks: readonly Block[], format: ExportFormat): Promise<Buffer> {
    switch (format) {
      case 'docx':
        return blocksToDocx(blocks, this.config.package);
      case 'pdf':
        return blocksToPdf(blocks, this.config.print);
    }
  }
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'EXPORT_FAILED';
}
