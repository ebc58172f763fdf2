/**
 * Line tokenizer for AsciiDoc source
 *
 * @since 2025-12-08
 */

export { AsciiDocTokenizer, LINE_RULES, classifyLine } from './AsciiDocTokenizer.js';
export { TokenType } from './types.js';
export type { Token, TokenSource, LineRule } from './types.js';
