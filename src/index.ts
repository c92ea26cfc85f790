/**
 * prose-export
 *
 * 编辑器 HTML → docx / pdf
 */

export * from './document/blocks';
export * from './format';

export {
  DocumentExportService,
  resolveExportFileName,
  type DocumentExportServiceDeps,
  type ExportFailure,
  type ExportOutcome,
  type ExportRequest,
  type ExportSuccess,
} from './export/DocumentExportService';
export { ExportLogger, type ExportLogEvent, type ExportLoggerConfig } from './export/logging';

export {
  ExportConfigError,
  getExportConfig,
  loadExportConfig,
  type ExportConfig,
} from './config/exportConfig';
