/**
 * AsciiDoc Tokenizer
 *
 * Splits input into line tokens. A line at the start of a row is trimmed and
 * classified by the first matching rule of LINE_RULES; the order matters
 * because several patterns overlap (a block macro also looks like a
 * description-list item, `====` like a header prefix, ...).
 *
 * @since 2025-12-08
 */

import { TokenType, type LineRule, type Token, type TokenSource } from './types.js';

/**
 * Line classification rules, tested top to bottom
 */
export const LINE_RULES: readonly LineRule[] = [
  { type: TokenType.Header, pattern: /^=+\s+.+/ },
  { type: TokenType.ListItem, pattern: /^(\*+|\d+\.)\s+(\[[ xX]\]\s+)?.+/ },
  { type: TokenType.TableDelimiter, pattern: /^\|===+$/ },
  { type: TokenType.TableRow, pattern: /^\|.*$/ },
  { type: TokenType.BlockQuoteDelimiter, pattern: /^_{4,}$/ },
  { type: TokenType.SidebarDelimiter, pattern: /^\*{4,}$/ },
  { type: TokenType.ExampleDelimiter, pattern: /^={4,}$/ },
  // Only match lines no other rule accepts, so they can sit anywhere in the list
  { type: TokenType.OpenDelimiter, pattern: /^--$/ },
  { type: TokenType.LiteralDelimiter, pattern: /^\.{4,}$/ },
  { type: TokenType.PassthroughDelimiter, pattern: /^\+{4,}$/ },
  { type: TokenType.AttributeLine, pattern: /^:[^:!]+!?:\s*.*$/ },
  { type: TokenType.AttributeBlockLine, pattern: /^\[[^\]]+\]$/ },
  { type: TokenType.CodeBlockDelimiter, pattern: /^----\w*$/ },
  { type: TokenType.AdmonitionBlock, pattern: /^(NOTE|TIP|IMPORTANT|WARNING|CAUTION):\s*.*$/ },
  { type: TokenType.TableOfContents, pattern: /^toc::\s*\[.*\]$/ },
  { type: TokenType.BlockMacro, pattern: /^\w+::[^\[]*\[[^\]]*\]$/ },
  { type: TokenType.DescriptionListItem, pattern: /^[^:\[\]]+::\s*.*$/ },
];

/**
 * Classify an already trimmed, non-empty line
 */
export function classifyLine(line: string): TokenType {
  for (const rule of LINE_RULES) {
    if (rule.pattern.test(line)) {
      return rule.type;
    }
  }
  return TokenType.Text;
}

/**
 * Lazy line tokenizer
 */
export class AsciiDocTokenizer implements TokenSource {
  private input = '';
  private position = 0;
  private line = 1;
  private column = 1;

  constructor(input?: string) {
    if (input !== undefined) {
      this.reset(input);
    }
  }

  get hasMoreTokens(): boolean {
    return this.position < this.input.length;
  }

  /**
   * Rewind to the start of `input`
   */
  reset(input: string): void {
    if (typeof input !== 'string') {
      throw new TypeError('Tokenizer input must be a string');
    }
    this.input = input;
    this.position = 0;
    this.line = 1;
    this.column = 1;
  }

  /**
   * All tokens of `input`, ending with exactly one EndOfFile
   */
  *tokenize(input: string): Generator<Token> {
    this.reset(input);
    while (this.hasMoreTokens) {
      const token = this.nextToken();
      if (token.type === TokenType.EndOfFile) break;
      yield token;
    }
    yield this.createToken(TokenType.EndOfFile, '');
  }

  nextToken(): Token {
    this.skipWhitespace();

    if (!this.hasMoreTokens) {
      return this.createToken(TokenType.EndOfFile, '');
    }

    if (this.input[this.position] === '\n') {
      return this.readNewLine();
    }

    if (this.isAtStartOfLine()) {
      const content = this.readLine().trim();
      // Unreachable from nextToken: skipWhitespace stops on the '\n' of a blank line first
      if (content === '') {
        return this.createToken(TokenType.EmptyLine, '');
      }
      return this.createToken(classifyLine(content), content);
    }

    // Indented line: the rest of it is plain text
    return this.createToken(TokenType.Text, this.readLine().trimEnd());
  }

  private isAtStartOfLine(): boolean {
    return this.column === 1 || (this.position > 0 && this.input[this.position - 1] === '\n');
  }

  private readNewLine(): Token {
    const token = this.createToken(TokenType.NewLine, '\n');
    this.position++;
    this.line++;
    this.column = 1;
    return token;
  }

  /**
   * Read up to (not including) the next newline
   */
  private readLine(): string {
    const start = this.position;
    while (this.hasMoreTokens && this.input[this.position] !== '\n') {
      this.position++;
      this.column++;
    }
    return this.input.slice(start, this.position);
  }

  private skipWhitespace(): void {
    while (this.hasMoreTokens && this.input[this.position] !== '\n' && /\s/.test(this.input[this.position])) {
      this.position++;
      this.column++;
    }
  }

  private createToken(type: TokenType, value: string): Token {
    return { type, value, line: this.line, column: this.column, position: this.position };
  }
}
