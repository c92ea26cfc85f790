/**
 * Block → PDF 渲染器
 *
 * 【职责】
 * 将 Block 序列映射为 pdfmake 的内容树（flowable），由 pdfmake/pdfkit 分页输出。
 *
 * 【布局规则】
 * - heading → 标题段落 + 间距（级别越高间距越大）
 * - listItem → 先缓存，列表结束或遇到非列表块时合并为一个 ul/ol
 * - quote → 缩进、斜体、着色段落 + 间距
 * - paragraph → 普通段落 + 小间距
 * - 空文档 → 一个占位段落（pdfmake 不接受空内容）
 *
 * 列表必须整体输出：pdfmake 按整个 ul/ol 排列编号和符号，
 * 逐项输出会让每一项都从 1 开始编号。
 */

import PdfPrinter from 'pdfmake';
import type {
  Content,
  ContentOrderedList,
  ContentText,
  ContentUnorderedList,
  StyleDictionary,
  TDocumentDefinitions,
  TFontDictionary,
} from 'pdfmake/interfaces';

import type { Block, HeadingLevel, ListItemBlock } from '../../document/blocks';
import { isSameList } from '../../document/blocks';
import { htmlToBlocks } from '../html/htmlToBlocks';
import type { PrintRenderOptions } from '../types';
import { DEFAULT_PRINT_OPTIONS, RenderFailureError, describeError } from '../types';

// ==========================================
// 样式
// ==========================================

/**
 * PDF 标准 14 字体，不需要字体文件
 */
const STANDARD_FONTS: TFontDictionary = {
  Helvetica: {
    normal: 'Helvetica',
    bold: 'Helvetica-Bold',
    italics: 'Helvetica-Oblique',
    bolditalics: 'Helvetica-BoldOblique',
  },
};

export const PRINT_STYLES: StyleDictionary = {
  heading1: { fontSize: 20, bold: true },
  heading2: { fontSize: 16, bold: true },
  heading3: { fontSize: 13, bold: true },
  paragraph: { fontSize: 11, lineHeight: 1.3 },
  list: { fontSize: 11, lineHeight: 1.3 },
  quote: { fontSize: 11, italics: true, color: '#555555', margin: [24, 0, 24, 0] },
};

/** 标题后的间距（pt），随级别递减 */
export const HEADING_SPACING: Record<HeadingLevel, number> = {
  1: 12,
  2: 8,
  3: 6,
};

export const PARAGRAPH_SPACING = 6;
export const QUOTE_SPACING = 10;
export const LIST_SPACING = 6;

// ==========================================
// 内容树构建
// ==========================================

/**
 * 间距 flowable
 */
export function spacer(height: number): ContentText {
  return { text: '', margin: [0, 0, 0, height] };
}

function createList(items: readonly ListItemBlock[]): ContentUnorderedList | ContentOrderedList {
  const texts = items.map((item) => item.text);
  return items[0].listKind === 'bullet'
    ? { ul: texts, style: 'list' }
    : { ol: texts, style: 'list' };
}

/**
 * Block 序列 → pdfmake 内容树
 *
 * 纯函数，不做任何 I/O。
 */
export function blocksToPdfContent(
  blocks: readonly Block[],
  placeholderText: string = DEFAULT_PRINT_OPTIONS.placeholderText
): Content[] {
  const content: Content[] = [];
  let pendingItems: ListItemBlock[] = [];

  const flushList = (): void => {
    if (pendingItems.length === 0) return;
    content.push(createList(pendingItems), spacer(LIST_SPACING));
    pendingItems = [];
  };

  for (const block of blocks) {
    if (block.kind === 'listItem') {
      const last = pendingItems[pendingItems.length - 1];
      if (last && !isSameList(last, block)) {
        flushList();
      }
      pendingItems.push(block);
      continue;
    }

    flushList();

    switch (block.kind) {
      case 'heading':
        content.push(
          { text: block.text, style: `heading${block.level}` },
          spacer(HEADING_SPACING[block.level])
        );
        break;
      case 'quote':
        content.push({ text: block.text, style: 'quote' }, spacer(QUOTE_SPACING));
        break;
      case 'paragraph':
        content.push({ text: block.text, style: 'paragraph' }, spacer(PARAGRAPH_SPACING));
        break;
    }
  }

  flushList();

  if (content.length === 0) {
    content.push({ text: placeholderText, style: 'paragraph' });
  }

  return content;
}

/**
 * 构建完整的 pdfmake 文档定义
 */
export function createPdfDefinition(
  blocks: readonly Block[],
  options: PrintRenderOptions = DEFAULT_PRINT_OPTIONS
): TDocumentDefinitions {
  return {
    pageSize: options.pageSize,
    pageMargins: options.margin,
    info: {
      title: options.title ?? 'Document',
      creator: options.creator,
      producer: options.creator,
    },
    content: blocksToPdfContent(blocks, options.placeholderText),
    styles: PRINT_STYLES,
    defaultStyle: { font: 'Helvetica' },
  };
}

// ==========================================
// 输出
// ==========================================

/**
 * 读取 pdfkit 文档流，拼接为 Buffer
 */
function printToBuffer(definition: TDocumentDefinitions): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const printer = new PdfPrinter(STANDARD_FONTS);
    const pdfDoc = printer.createPdfKitDocument(definition);
    const chunks: Buffer[] = [];

    pdfDoc.on('data', (chunk: Buffer) => chunks.push(chunk));
    pdfDoc.on('end', () => resolve(Buffer.concat(chunks)));
    pdfDoc.on('error', reject);
    pdfDoc.end();
  });
}

/**
 * Block 序列 → PDF 字节
 */
export async function blocksToPdf(
  blocks: readonly Block[],
  options: PrintRenderOptions = DEFAULT_PRINT_OPTIONS
): Promise<Buffer> {
  try {
    return await printToBuffer(createPdfDefinition(blocks, options));
  } catch (error) {
    throw new RenderFailureError(`Failed to lay out print document: ${describeError(error)}`, 'pdf', error);
  }
}

/**
 * HTML → PDF 字节
 */
export async function renderPrint(
  html: string,
  options: PrintRenderOptions = DEFAULT_PRINT_OPTIONS
): Promise<Buffer> {
  return blocksToPdf(htmlToBlocks(html), options);
}
