/**
 * Format 层导出
 *
 * 此层负责 HTML → Block → docx / pdf 的转换
 */

// 类型
export * from './types';

// HTML 解析
export { HtmlBlockParser, htmlToBlocks, type HtmlBlockParserOptions } from './html/htmlToBlocks';

// docx 渲染
export { blocksToDocx, createDocxDocument, renderPackage } from './docx/blocksToDocx';

// pdf 渲染
export { blocksToPdf, blocksToPdfContent, createPdfDefinition, renderPrint } from './pdf/blocksToPdf';

// 文本清理
export { stripFences } from './text/stripFences';
