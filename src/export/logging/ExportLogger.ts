/**
 * ExportLogger - 导出日志记录器
 *
 * 【职责】
 * - 记录导出的开始、成功、失败事件
 * - 输出到控制台
 *
 * 【设计原则】
 * - 不抛异常，日志失败不影响导出
 * - 不记录文档正文
 */

import type {
  ExportLogEvent,
  ExportLoggerConfig,
  LogPhase,
  RequestMeta,
  ResultMeta,
} from './types';
import { DEFAULT_LOGGER_CONFIG, generateLogEventId, truncateForPreview } from './types';

export class ExportLogger {
  private config: ExportLoggerConfig;

  constructor(config?: Partial<ExportLoggerConfig>) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  // ==========================================
  // 公开方法
  // ==========================================

  /**
   * 记录开始事件
   */
  logStarted(params: { request: RequestMeta }): void {
    this.emit('started', params.request);
  }

  /**
   * 记录成功事件
   */
  logSucceeded(params: { request: RequestMeta; result: ResultMeta; durationMs: number }): void {
    this.emit('succeeded', params.request, params.durationMs, params.result);
  }

  /**
   * 记录失败事件
   */
  logFailed(params: { request: RequestMeta; error: string; durationMs: number }): void {
    this.emit('failed', params.request, params.durationMs, undefined, params.error);
  }

  // ==========================================
  // 私有方法
  // ==========================================

  private emit(
    phase: LogPhase,
    request: RequestMeta,
    durationMs?: number,
    result?: ResultMeta,
    error?: string
  ): void {
    if (!this.config.enabled) return;

    try {
      const event = this.buildEvent(phase, request, durationMs, result, error);
      if (this.config.consoleOutput) {
        this.outputToConsole(event);
      }
    } catch (logError) {
      this.handleLogError(phase, logError);
    }
  }

  /**
   * 构建日志事件
   */
  private buildEvent(
    phase: LogPhase,
    request: RequestMeta,
    durationMs?: number,
    result?: ResultMeta,
    error?: string
  ): ExportLogEvent {
    const event: ExportLogEvent = {
      id: generateLogEventId(),
      timestamp: Date.now(),
      phase,
      requestMeta: {
        ...request,
        ...(request.fileNamePreview !== undefined && {
          fileNamePreview: truncateForPreview(request.fileNamePreview, this.config.previewMaxLength),
        }),
      },
    };

    if (durationMs !== undefined) {
      event.durationMs = durationMs;
    }

    if (result) {
      event.resultMeta = result;
    }

    if (error) {
      event.error = error;
    }

    return event;
  }

  /**
   * 输出到控制台
   */
  private outputToConsole(event: ExportLogEvent): void {
    const prefix = `[ExportLogger][${event.phase}]`;
    const summary = {
      exportId: event.requestMeta.exportId,
      format: event.requestMeta.format,
      htmlLength: event.requestMeta.htmlLength,
      ...(event.durationMs !== undefined && { durationMs: event.durationMs }),
      ...(event.resultMeta && {
        blockCount: event.resultMeta.blockCount,
        byteLength: event.resultMeta.byteLength,
      }),
      ...(event.error && { error: event.error }),
    };

    if (event.phase === 'failed') {
      console.warn(prefix, summary);
    } else {
      console.log(prefix, summary);
    }
  }

  /**
   * 处理日志错误
   */
  private handleLogError(phase: LogPhase, error: unknown): void {
    console.error(`[ExportLogger] log ${phase} failed:`, error);
  }
}
