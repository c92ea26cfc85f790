import { describe, it, expect } from 'vitest';
import { ExportConfigError, loadExportConfig } from '../exportConfig';

describe('loadExportConfig', () => {
  it('没有环境变量时使用默认值', () => {
    expect(loadExportConfig({})).toEqual({
      package: { pageSize: 'A4', margin: 72, creator: 'prose-export' },
      print: {
        pageSize: 'A4',
        margin: 72,
        creator: 'prose-export',
        placeholderText: 'This document is empty.',
      },
      logEnabled: true,
    });
  });

  it('应该读取环境变量', () => {
    const config = loadExportConfig({
      EXPORT_PAGE_SIZE: 'letter',
      EXPORT_PAGE_MARGIN: '36',
      EXPORT_PLACEHOLDER_TEXT: '  Nothing yet  ',
      EXPORT_DOCUMENT_CREATOR: 'Editor',
      EXPORT_LOG_ENABLED: 'false',
    });

    expect(config.package).toEqual({ pageSize: 'LETTER', margin: 36, creator: 'Editor' });
    expect(config.print.placeholderText).toBe('Nothing yet');
    expect(config.logEnabled).toBe(false);
  });

  it('不支持的页面尺寸抛出 ExportConfigError', () => {
    expect(() => loadExportConfig({ EXPORT_PAGE_SIZE: 'A3' })).toThrow(ExportConfigError);
  });

  it('非数字页边距抛出 ExportConfigError', () => {
    expect(() => loadExportConfig({ EXPORT_PAGE_MARGIN: 'wide' })).toThrow(ExportConfigError);
  });

  it('错误中包含出错的字段', () => {
    try {
      loadExportConfig({ EXPORT_LOG_ENABLED: 'maybe' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExportConfigError);
      if (error instanceof ExportConfigError) {
        expect(error.code).toBe('INVALID_CONFIG');
        expect(error.issues).toHaveProperty('EXPORT_LOG_ENABLED');
      }
    }
  });
});
