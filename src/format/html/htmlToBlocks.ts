/**
 * HTML → Block 流式解析器
 *
 * 【职责】
 * 将编辑器输出的 HTML 解析为有序的 Block 序列。
 * 直接消费 htmlparser2 Tokenizer 的原始标签流，边读边产出，不回溯、不构建 DOM。
 * 不使用 Parser：它会补全隐式闭合、为孤立的 </p> 补出 <p>，
 * 而这里只响应输入中真实出现的标签。
 *
 * 【支持的 HTML 子集（白名单）】
 * 块级：
 * - <p> → paragraph
 * - <h1>~<h3> → heading（level 取自标签）
 * - <li> → listItem（listKind 取自 flush 时打开的 <ul>/<ol>）
 * - <blockquote> → quote
 *
 * 容器：
 * - <ul> / <ol> → 设置当前列表类型，不改变块状态
 * - </ul> / </ol> → 清除当前列表类型，不 flush
 *
 * 内联：
 * - <br> → 在缓冲区追加 '\n'，不 flush
 * - 其他标签（包括 div、pre、h4 等块级标签）→ 忽略标签本身，文本照常进入缓冲区
 *
 * 【状态机】
 * Idle → InParagraph / InHeading(level) / InListItem / InBlockquote
 * - 打开新的块级标签时，先 flush 当前块
 * - 遇到与当前块同名的结束标签时 flush，回到 Idle
 * - 输入结束时强制 flush 一次，未闭合的尾部内容不会丢失
 *
 * 【Flush 规则】
 * 缓冲区 trim 后为空则丢弃；否则按标签生成 Block。
 */

import { Tokenizer } from 'htmlparser2';
import type { TokenizerCallbacks } from 'htmlparser2';
import type { Block, HeadingLevel, ListKind } from '../../document/blocks';
import {
  ORPHAN_LIST_KIND,
  createHeadingBlock,
  createListItemBlock,
  createParagraphBlock,
  createQuoteBlock,
} from '../../document/blocks';
import { MalformedMarkupError, describeError } from '../types';

// ==========================================
// 类型定义
// ==========================================

type BlockTag = 'p' | 'h1' | 'h2' | 'h3' | 'li' | 'blockquote';

type ParserState =
  | { name: 'idle' }
  | { name: 'inParagraph'; tag: 'p' }
  | { name: 'inHeading'; tag: 'h1' | 'h2' | 'h3'; level: HeadingLevel }
  | { name: 'inListItem'; tag: 'li' }
  | { name: 'inBlockquote'; tag: 'blockquote' };

interface ListContainer {
  kind: ListKind;
  id: number;
}

export interface HtmlBlockParserOptions {
  /** 每产出一个 Block 时回调 */
  onBlock: (block: Block) => void;
}

// ==========================================
// 标签映射
// ==========================================

const BLOCK_TAG_STATES: Record<BlockTag, ParserState> = {
  p: { name: 'inParagraph', tag: 'p' },
  h1: { name: 'inHeading', tag: 'h1', level: 1 },
  h2: { name: 'inHeading', tag: 'h2', level: 2 },
  h3: { name: 'inHeading', tag: 'h3', level: 3 },
  li: { name: 'inListItem', tag: 'li' },
  blockquote: { name: 'inBlockquote', tag: 'blockquote' },
};

const LIST_CONTAINER_KINDS = new Map<string, ListKind>([
  ['ul', 'bullet'],
  ['ol', 'number'],
]);

function isBlockTag(name: string): name is BlockTag {
  return Object.prototype.hasOwnProperty.call(BLOCK_TAG_STATES, name);
}

// ==========================================
// 输入窗口
// ==========================================

/**
 * Tokenizer 回调只给出全局下标，这里保存尚未读完的分片，
 * 按下标取回标签名和文本。下标单调递增，读过的分片会被丢弃。
 */
class ChunkWindow {
  private chunks: string[] = [];
  private offset = 0;

  push(chunk: string): void {
    this.chunks.push(chunk);
  }

  slice(start: number, end: number): string {
    while (this.chunks.length > 1 && start - this.offset >= this.chunks[0].length) {
      this.offset += this.chunks[0].length;
      this.chunks.shift();
    }

    let result = '';
    let base = this.offset;
    for (const chunk of this.chunks) {
      if (base >= end) break;
      result += chunk.slice(Math.max(start - base, 0), Math.min(end - base, chunk.length));
      base += chunk.length;
    }
    return result;
  }
}

// ==========================================
// HtmlBlockParser
// ==========================================

/**
 * 增量解析器
 *
 * 可以多次 write() 分片输入，最后调用 end()。
 * 每个实例只用于一次解析。
 */
export class HtmlBlockParser {
  private state: ParserState = { name: 'idle' };
  private list: ListContainer | null = null;
  private listCount = 0;
  private buffer: string[] = [];
  private ended = false;

  private readonly input = new ChunkWindow();
  private readonly tokenizer: Tokenizer;
  private readonly onBlock: (block: Block) => void;

  constructor(options: HtmlBlockParserOptions) {
    this.onBlock = options.onBlock;

    const ignore = (): void => undefined;
    const callbacks: TokenizerCallbacks = {
      onopentagname: (start, end) => this.handleOpenTag(this.readTagName(start, end)),
      onclosetag: (start, end) => this.handleCloseTag(this.readTagName(start, end)),
      ontext: (start, end) => this.buffer.push(this.input.slice(start, end)),
      ontextentity: (codepoint) => this.buffer.push(String.fromCodePoint(codepoint)),
      onend: () => this.flush(),
      // 属性、注释、声明不参与块结构
      onattribdata: ignore,
      onattribentity: ignore,
      onattribend: ignore,
      onattribname: ignore,
      oncdata: ignore,
      oncomment: ignore,
      ondeclaration: ignore,
      onopentagend: ignore,
      onprocessinginstruction: ignore,
      onselfclosingtag: ignore,
    };
    this.tokenizer = new Tokenizer({ decodeEntities: true }, callbacks);
  }

  /**
   * 写入一段 HTML
   */
  write(chunk: string): void {
    if (this.ended) {
      throw new MalformedMarkupError('Cannot write after the parser has ended');
    }
    if (typeof chunk !== 'string') {
      throw new MalformedMarkupError(`Expected markup as a string, got ${typeof chunk}`);
    }
    this.input.push(chunk);
    this.run(() => this.tokenizer.write(chunk));
  }

  /**
   * 结束输入，flush 尚未闭合的块
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.run(() => this.tokenizer.end());
  }

  // ==========================================
  // 状态转换
  // ==========================================

  private handleOpenTag(name: string): void {
    if (isBlockTag(name)) {
      this.flush();
      this.state = BLOCK_TAG_STATES[name];
      return;
    }

    const listKind = LIST_CONTAINER_KINDS.get(name);
    if (listKind) {
      this.listCount++;
      this.list = { kind: listKind, id: this.listCount };
      return;
    }

    if (name === 'br') {
      this.buffer.push('\n');
    }
  }

  private handleCloseTag(name: string): void {
    if (LIST_CONTAINER_KINDS.has(name)) {
      this.list = null;
      return;
    }

    if (this.state.name !== 'idle' && this.state.tag === name) {
      this.flush();
    }
  }

  private readTagName(start: number, end: number): string {
    return this.input.slice(start, end).toLowerCase();
  }

  // ==========================================
  // Block 组装
  // ==========================================

  /**
   * 将缓冲区交给一个新 Block，并重置为 Idle
   */
  private flush(): void {
    const text = this.buffer.join('').trim();
    const state = this.state;
    this.buffer = [];
    this.state = { name: 'idle' };

    if (!text) return;

    this.onBlock(this.createBlock(state, text));
  }

  private createBlock(state: ParserState, text: string): Block {
    switch (state.name) {
      case 'inHeading':
        return createHeadingBlock(state.level, text);
      case 'inListItem':
        return this.list
          ? createListItemBlock(this.list.kind, text, this.list.id)
          : createListItemBlock(ORPHAN_LIST_KIND, text);
      case 'inBlockquote':
        return createQuoteBlock(text);
      case 'inParagraph':
      case 'idle':
        return createParagraphBlock(text);
    }
  }

  private run(step: () => void): void {
    try {
      step();
    } catch (error) {
      if (error instanceof MalformedMarkupError) throw error;
      throw new MalformedMarkupError(`Failed to tokenize markup: ${describeError(error)}`, error);
    }
  }
}

// ==========================================
// 主函数
// ==========================================

/**
 * 将 HTML 字符串解析为 Block 序列
 *
 * @param html - HTML 片段（实体解码由 htmlparser2 完成）
 */
export function htmlToBlocks(html: string): Block[] {
  const blocks: Block[] = [];
  const parser = new HtmlBlockParser({ onBlock: (block) => blocks.push(block) });
  parser.write(html);
  parser.end();
  return blocks;
}
