const CODE_BLOCK_PATTERN = /```(?:javascript|js)[^\S\r\n]*\r?\n([\s\S]*?)```/g;

/**
 * Body of the last ```javascript (or ```js) block in `text`, or '' when there is none.
 */
export function extractCode(text: string): string {
  let code = '';
  for (const match of text.matchAll(CODE_BLOCK_PATTERN)) {
    code = match[1];
  }
  return code.replace(/\r?\n$/, '');
}
