import { Token, TokenType } from '../types';

const XML_TAGS: Partial<Record<TokenType, string>> = {
  [TokenType.KEYWORD]: 'keyword',
  [TokenType.SYMBOL]: 'symbol',
  [TokenType.INTEGER_CONSTANT]: 'integerConstant',
  [TokenType.STRING_CONSTANT]: 'stringConstant',
  [TokenType.IDENTIFIER]: 'identifier',
};

const XML_ESCAPES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
};

export const escapeXml = (text: string): string => text.replace(/[<>&"]/g, (char) => XML_ESCAPES[char]);

/**
 * Debug view of a token stream, one `<kind> value </kind>` element per line.
 */
export function tokensToXml(tokens: readonly Token[]): string {
  const lines = ['<tokens>'];
  for (const token of tokens) {
    const tag = XML_TAGS[token.type];
    if (!tag) continue;
    lines.push(`<${tag}> ${escapeXml(token.value)} </${tag}>`);
  }
  lines.push('</tokens>');
  return lines.join('\n');
}
