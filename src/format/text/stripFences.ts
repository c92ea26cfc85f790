/**
 * 去除 Markdown 代码围栏
 *
 * 模型输出的 HTML 经常被包在 ```html ... ``` 里。
 * 首尾都是 ``` 时去掉这一对围栏（开头的围栏可以带语言标记），否则原样返回。
 *
 * 去掉一层后如果内容仍然被围栏包裹，继续去掉，
 * 保证 stripFences(stripFences(x)) === stripFences(x)。
 */

const FENCE = '```';

/** 开头围栏：``` + 可选语言标记 + 换行 */
const OPENING_FENCE = /^```[\w+.#-]*[ \t]*\r?\n/;

function stripOnce(text: string): string | null {
  const trimmed = text.trim();
  if (trimmed.length < FENCE.length * 2 || !trimmed.startsWith(FENCE) || !trimmed.endsWith(FENCE)) {
    return null;
  }

  const opening = OPENING_FENCE.exec(trimmed);
  const bodyStart = opening ? opening[0].length : FENCE.length;
  return trimmed.slice(bodyStart, trimmed.length - FENCE.length).trim();
}

export function stripFences(text: string): string {
  let current = text;
  for (let stripped = stripOnce(current); stripped !== null; stripped = stripOnce(current)) {
    current = stripped;
  }
  return current;
}
