/**
 * Block → docx 渲染器
 *
 * 使用纯 JavaScript 的 docx npm 包生成 .docx 文件。
 * 整个打包过程在内存中完成（Packer.toBuffer），调用方只拿到字节，
 * 不会看到任何路径。
 *
 * 【块级映射】
 * - heading → 内置 Heading1~Heading3 样式段落
 * - listItem → 项目符号 / 编号段落（每段连续的列表一个编号实例）
 * - quote → IntenseQuote 样式段落
 * - paragraph → 普通段落
 */

import {
  AlignmentType,
  Document,
  HeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  TextRun,
} from 'docx';

import type { Block, HeadingBlock, ListItemBlock } from '../../document/blocks';
import { isSameList, splitLines } from '../../document/blocks';
import { htmlToBlocks } from '../html/htmlToBlocks';
import type { PackageRenderOptions, PageSize } from '../types';
import { DEFAULT_PACKAGE_OPTIONS, RenderFailureError, describeError } from '../types';

// ==========================================
// 常量
// ==========================================

const NUMBERED_LIST_REFERENCE = 'numbered-list';

export const QUOTE_STYLE_ID = 'IntenseQuote';

/** 1pt = 20 twip */
const TWIPS_PER_POINT = 20;

/** 页面尺寸（twip） */
const PAGE_SIZES_TWIPS: Record<PageSize, { width: number; height: number }> = {
  A4: { width: 11906, height: 16838 },
  LETTER: { width: 12240, height: 15840 },
};

const HEADING_LEVELS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3,
} as const;

// ==========================================
// 段落映射
// ==========================================

/**
 * 文本转 TextRun，'\n' 转为换行
 */
function createRuns(text: string): TextRun[] {
  return splitLines(text).map((line, index) =>
    index === 0 ? new TextRun({ text: line }) : new TextRun({ text: line, break: 1 })
  );
}

function createHeadingParagraph(block: HeadingBlock): Paragraph {
  return new Paragraph({
    heading: HEADING_LEVELS[block.level],
    children: createRuns(block.text),
  });
}

/**
 * 列表项段落
 *
 * 编号列表按 instance 区分，每个 instance 从 1 重新开始。
 */
function createListItemParagraph(block: ListItemBlock, instance: number): Paragraph {
  if (block.listKind === 'bullet') {
    return new Paragraph({
      bullet: { level: 0 },
      children: createRuns(block.text),
    });
  }

  return new Paragraph({
    numbering: {
      reference: NUMBERED_LIST_REFERENCE,
      level: 0,
      instance,
    },
    children: createRuns(block.text),
  });
}

export function blockToParagraph(block: Block, listInstance = 0): Paragraph {
  switch (block.kind) {
    case 'heading':
      return createHeadingParagraph(block);
    case 'listItem':
      return createListItemParagraph(block, listInstance);
    case 'quote':
      return new Paragraph({
        style: QUOTE_STYLE_ID,
        children: createRuns(block.text),
      });
    case 'paragraph':
      return new Paragraph({ children: createRuns(block.text) });
  }
}

// ==========================================
// 文档组装
// ==========================================

/**
 * 为每个 Block 分配列表编号实例
 *
 * 分组规则与 PDF 列表相同（isSameList）：连续且属于同一列表的项共用一个实例，
 * 没有容器的 <li> 被其他块隔开后重新编号。
 */
export function assignListInstances(blocks: readonly Block[]): number[] {
  const instances: number[] = [];
  let instance = 0;

  for (const [index, block] of blocks.entries()) {
    const previous = index > 0 ? blocks[index - 1] : undefined;
    if (block.kind === 'listItem' && !(previous?.kind === 'listItem' && isSameList(previous, block))) {
      instance++;
    }
    instances.push(instance);
  }

  return instances;
}

/**
 * 构建 docx Document
 */
export function createDocxDocument(
  blocks: readonly Block[],
  options: PackageRenderOptions = DEFAULT_PACKAGE_OPTIONS
): Document {
  const margin = options.margin * TWIPS_PER_POINT;
  const instances = assignListInstances(blocks);
  const children = blocks.map((block, index) => blockToParagraph(block, instances[index]));

  // 空文档也输出一个空段落，保证 package 结构有效
  if (children.length === 0) {
    children.push(new Paragraph({ children: [new TextRun({ text: '' })] }));
  }

  return new Document({
    creator: options.creator,
    title: options.title ?? 'Document',
    styles: {
      paragraphStyles: [
        {
          id: QUOTE_STYLE_ID,
          name: 'Intense Quote',
          basedOn: 'Normal',
          next: 'Normal',
          quickFormat: true,
          run: {
            italics: true,
            color: '2F5496',
          },
          paragraph: {
            indent: { left: 864, right: 864 },
            spacing: { before: 240, after: 240 },
          },
        },
      ],
    },
    numbering: {
      config: [
        {
          reference: NUMBERED_LIST_REFERENCE,
          levels: [
            {
              level: 0,
              format: LevelFormat.DECIMAL,
              text: '%1.',
              alignment: AlignmentType.START,
              style: {
                paragraph: {
                  indent: { left: 720, hanging: 360 },
                },
              },
            },
          ],
        },
      ],
    },
    sections: [
      {
        properties: {
          page: {
            size: PAGE_SIZES_TWIPS[options.pageSize],
            margin: { top: margin, right: margin, bottom: margin, left: margin },
          },
        },
        children,
      },
    ],
  });
}

/**
 * Block 序列 → docx 字节
 */
export async function blocksToDocx(
  blocks: readonly Block[],
  options: PackageRenderOptions = DEFAULT_PACKAGE_OPTIONS
): Promise<Buffer> {
  try {
    return await Packer.toBuffer(createDocxDocument(blocks, options));
  } catch (error) {
    throw new RenderFailureError(`Failed to build docx package: ${describeError(error)}`, 'docx', error);
  }
}

/**
 * HTML → docx 字节
 */
export async function renderPackage(
  html: string,
  options: PackageRenderOptions = DEFAULT_PACKAGE_OPTIONS
): Promise<Buffer> {
  return blocksToDocx(htmlToBlocks(html), options);
}
