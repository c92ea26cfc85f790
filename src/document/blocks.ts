/**
 * Block 文档模型
 *
 * 【层级职责】
 * Block 是解析器与渲染器之间唯一的数据契约：
 * - 解析器（format/html）在 flush 时创建 Block
 * - 渲染器（format/docx、format/pdf）按顺序消费 Block
 *
 * 【禁止事项】
 * - Block 创建后不允许修改
 * - 不允许持久化 Block（它只存在于一次导出调用中）
 * - 不允许在此层处理 HTML 或输出格式细节
 *
 * 【不变量】
 * - text 非空，且已经 trim
 * - 块内换行统一用 '\n' 表示
 */

// ==========================================
// 基础类型
// ==========================================

export type BlockKind = 'paragraph' | 'heading' | 'listItem' | 'quote';

export type HeadingLevel = 1 | 2 | 3;

/**
 * 列表容器类型：<ul> → bullet，<ol> → number
 */
export type ListKind = 'bullet' | 'number';

/**
 * 没有打开的列表容器时 <li> 使用的列表类型
 */
export const ORPHAN_LIST_KIND: ListKind = 'number';

// ==========================================
// Block 联合类型
// ==========================================

export interface ParagraphBlock {
  kind: 'paragraph';
  text: string;
}

export interface HeadingBlock {
  kind: 'heading';
  level: HeadingLevel;
  text: string;
}

export interface ListItemBlock {
  kind: 'listItem';
  listKind: ListKind;
  /** 所属列表容器在本次解析中的序号；没有容器时为空 */
  listId?: number;
  text: string;
}

export interface QuoteBlock {
  kind: 'quote';
  text: string;
}

export type Block = ParagraphBlock | HeadingBlock | ListItemBlock | QuoteBlock;

// ==========================================
// 工厂函数
// ==========================================

export function createParagraphBlock(text: string): ParagraphBlock {
  return { kind: 'paragraph', text };
}

export function createHeadingBlock(level: HeadingLevel, text: string): HeadingBlock {
  return { kind: 'heading', level, text };
}

export function createListItemBlock(
  listKind: ListKind,
  text: string,
  listId?: number
): ListItemBlock {
  const block: ListItemBlock = { kind: 'listItem', listKind, text };
  if (listId !== undefined) {
    block.listId = listId;
  }
  return block;
}

export function createQuoteBlock(text: string): QuoteBlock {
  return { kind: 'quote', text };
}

// ==========================================
// 工具函数
// ==========================================

/**
 * 判断两个列表项是否属于同一个列表容器
 */
export function isSameList(a: ListItemBlock, b: ListItemBlock): boolean {
  return a.listKind === b.listKind && a.listId === b.listId;
}

/**
 * 按类型统计 Block 数量（用于日志）
 */
export function countBlocksByKind(blocks: readonly Block[]): Record<BlockKind, number> {
  const counts: Record<BlockKind, number> = {
    paragraph: 0,
    heading: 0,
    listItem: 0,
    quote: 0,
  };
  for (const block of blocks) {
    counts[block.kind]++;
  }
  return counts;
}

/**
 * 块内文本按换行拆分
 */
export function splitLines(text: string): string[] {
  return text.split('\n');
}
