export { Lexer } from './lexer';
export { tokensToXml, escapeXml } from './token-xml';
