/**
 * HTML → Block 解析测试
 *
 * 测试覆盖：
 * - p/h1/h2/h3/li/blockquote → Block
 * - ul/ol 列表容器与 listId
 * - 未闭合的块、孤立的结束标签、空白内容
 * - 非语义块级标签（div/pre/h4/section）透明
 * - 分片写入
 */

import { describe, it, expect } from 'vitest';
import { HtmlBlockParser, htmlToBlocks } from '../html/htmlToBlocks';
import { MalformedMarkupError } from '../types';
import type { Block } from '../../document/blocks';

describe('htmlToBlocks', () => {
  // ==========================================
  // 基本块级元素
  // ==========================================

  describe('块级元素', () => {
    it('应该解析 <h2> 为 level 2 的 heading', () => {
      expect(htmlToBlocks('<h2>Title</h2>')).toEqual([
        { kind: 'heading', level: 2, text: 'Title' },
      ]);
    });

    it('应该解析 <p> 和 <blockquote>', () => {
      expect(htmlToBlocks('<p>Body</p><blockquote>Said someone</blockquote>')).toEqual([
        { kind: 'paragraph', text: 'Body' },
        { kind: 'quote', text: 'Said someone' },
      ]);
    });

    it('应该忽略大小写', () => {
      expect(htmlToBlocks('<H1>Big</H1>')).toEqual([{ kind: 'heading', level: 1, text: 'Big' }]);
    });

    it('Block 数量等于非空块级标签数量', () => {
      const html = [
        '<h1>T</h1>',
        '<p>One</p>',
        '<p> </p>',
        '<ul><li>x</li><li></li></ul>',
        '<blockquote>Q</blockquote>',
      ].join('\n');

      expect(htmlToBlocks(html)).toHaveLength(4);
    });
  });

  // ==========================================
  // 空白与 trim
  // ==========================================

  describe('空白内容', () => {
    it('纯空白段落不产生 Block', () => {
      expect(htmlToBlocks('<p>  </p>')).toEqual([]);
    });

    it('空输入不产生 Block', () => {
      expect(htmlToBlocks('')).toEqual([]);
    });

    it('应该 trim 文本', () => {
      expect(htmlToBlocks('<p>\n   padded  \n</p>')).toEqual([{ kind: 'paragraph', text: 'padded' }]);
    });
  });

  // ==========================================
  // 隐式闭合
  // ==========================================

  describe('未闭合的块', () => {
    it('打开新块时 flush 上一个块', () => {
      expect(htmlToBlocks('<p>A<h1>B</h1>')).toEqual([
        { kind: 'paragraph', text: 'A' },
        { kind: 'heading', level: 1, text: 'B' },
      ]);
    });

    it('输入结束时 flush 未闭合的块', () => {
      expect(htmlToBlocks('<p>Intro</p><blockquote>Unfinished')).toEqual([
        { kind: 'paragraph', text: 'Intro' },
        { kind: 'quote', text: 'Unfinished' },
      ]);
    });

    it('不匹配的结束标签不会 flush', () => {
      expect(htmlToBlocks('<h2>Sub</h3>more</h2>')).toEqual([{ kind: 'heading', level: 2, text: 'Submore' }]);
    });

    it('标题中孤立的 </p> 被忽略', () => {
      expect(htmlToBlocks('<h1>A</p>B</h1>')).toEqual([{ kind: 'heading', level: 1, text: 'AB' }]);
    });

    it('块外孤立的 </p> 不产生空段落', () => {
      expect(htmlToBlocks('</p><p>Only</p>')).toEqual([{ kind: 'paragraph', text: 'Only' }]);
    });

    it('块外文本作为段落输出', () => {
      expect(htmlToBlocks('Loose text<p>Next</p>')).toEqual([
        { kind: 'paragraph', text: 'Loose text' },
        { kind: 'paragraph', text: 'Next' },
      ]);
    });
  });

  // ==========================================
  // 列表
  // ==========================================

  describe('列表', () => {
    it('ul → bullet，ol → number，每个容器一个 listId', () => {
      expect(htmlToBlocks('<ul><li>A</li><li>B</li></ul><ol><li>C</li></ol>')).toEqual([
        { kind: 'listItem', listKind: 'bullet', listId: 1, text: 'A' },
        { kind: 'listItem', listKind: 'bullet', listId: 1, text: 'B' },
        { kind: 'listItem', listKind: 'number', listId: 2, text: 'C' },
      ]);
    });

    it('下一个 <li> 会 flush 未闭合的 <li>', () => {
      expect(htmlToBlocks('<ul><li>A<li>B</li></ul>')).toEqual([
        { kind: 'listItem', listKind: 'bullet', listId: 1, text: 'A' },
        { kind: 'listItem', listKind: 'bullet', listId: 1, text: 'B' },
      ]);
    });

    it('列表先于 <li> 关闭时，该项按无容器处理', () => {
      expect(htmlToBlocks('<ul><li>A</ul>')).toEqual([{ kind: 'listItem', listKind: 'number', text: 'A' }]);
    });

    it('孤立的 </ol> 也会清除当前列表', () => {
      expect(htmlToBlocks('<ul><li>A</li></ol><li>B</li>')).toEqual([
        { kind: 'listItem', listKind: 'bullet', listId: 1, text: 'A' },
        { kind: 'listItem', listKind: 'number', text: 'B' },
      ]);
    });

    it('没有列表容器的 <li> 默认为 number', () => {
      const blocks = htmlToBlocks('<li>Loose</li>');

      expect(blocks).toEqual([{ kind: 'listItem', listKind: 'number', text: 'Loose' }]);
      expect(blocks[0]).not.toHaveProperty('listId');
    });
  });

  // ==========================================
  // 内联
  // ==========================================

  describe('内联内容', () => {
    it('<br> 转为换行', () => {
      expect(htmlToBlocks('<p>Line one<br>Line two</p>')).toEqual([
        { kind: 'paragraph', text: 'Line one\nLine two' },
      ]);
    });

    it('末尾的 <br> 被 trim 掉', () => {
      expect(htmlToBlocks('<p>A<br/></p>')).toEqual([{ kind: 'paragraph', text: 'A' }]);
    });

    it('其他标签被忽略，文本保留', () => {
      expect(htmlToBlocks('<p>Hello <strong>bold</strong> and <em>it</em></p>')).toEqual([
        { kind: 'paragraph', text: 'Hello bold and it' },
      ]);
    });

    it('块级的非语义标签同样透明', () => {
      expect(htmlToBlocks('<p>A<div>B</div>C</p>')).toEqual([{ kind: 'paragraph', text: 'ABC' }]);
      expect(htmlToBlocks('<p>A <h4>B</h4> C</p>')).toEqual([{ kind: 'paragraph', text: 'A B C' }]);
      expect(htmlToBlocks('<blockquote><pre>code</pre> said</blockquote>')).toEqual([
        { kind: 'quote', text: 'code said' },
      ]);
    });

    it('section 等容器不改变 Block 数量', () => {
      const html = '<section><h2>Part</h2><div><p>One</p><p>Two</p></div></section><table><tr><td>cell</td></tr></table>';

      expect(htmlToBlocks(html)).toEqual([
        { kind: 'heading', level: 2, text: 'Part' },
        { kind: 'paragraph', text: 'One' },
        { kind: 'paragraph', text: 'Two' },
        { kind: 'paragraph', text: 'cell' },
      ]);
    });

    it('应该解码字符实体', () => {
      expect(htmlToBlocks('<p>Fish &amp; chips</p>')).toEqual([{ kind: 'paragraph', text: 'Fish & chips' }]);
    });
  });

  // ==========================================
  // 增量解析
  // ==========================================

  describe('HtmlBlockParser', () => {
    it('支持分片写入', () => {
      const blocks: Block[] = [];
      const parser = new HtmlBlockParser({ onBlock: (block) => blocks.push(block) });

      parser.write('<p>Hel');
      parser.write('lo</p><h');
      expect(blocks).toEqual([{ kind: 'paragraph', text: 'Hello' }]);

      parser.write('3>Sub</h3>');
      parser.end();

      expect(blocks).toEqual([
        { kind: 'paragraph', text: 'Hello' },
        { kind: 'heading', level: 3, text: 'Sub' },
      ]);
    });

    it('end() 之后不能再写入', () => {
      const parser = new HtmlBlockParser({ onBlock: () => undefined });
      parser.end();

      expect(() => parser.write('<p>late</p>')).toThrow(MalformedMarkupError);
    });

    it('非字符串输入抛出 MalformedMarkupError', () => {
      expect(() => htmlToBlocks(42 as unknown as string)).toThrow(MalformedMarkupError);
    });

    it('标签名可以跨分片', () => {
      const blocks: Block[] = [];
      const parser = new HtmlBlockParser({ onBlock: (block) => blocks.push(block) });

      parser.write('<block');
      parser.write('quote>Split</blockq');
      parser.write('uote><p>Next');
      parser.end();

      expect(blocks).toEqual([
        { kind: 'quote', text: 'Split' },
        { kind: 'paragraph', text: 'Next' },
      ]);
    });
  });
});
