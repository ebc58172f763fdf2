/**
 * ParseContext - cursor over a token source
 *
 * Holds the one-token lookahead plus the bookkeeping a parse needs:
 * document attributes, an element stack for consumers, and the include
 * chain used for cycle detection.
 *
 * @since 2025-12-08
 */

import type { DocumentElement } from '../model/types.js';
import { TokenType, type Token, type TokenSource } from '../tokenizer/types.js';
import { ParseError } from './errors.js';
import { ParseSession } from './ParseSession.js';

export interface ParseContextOptions {
  /** File (or directory) being parsed; includes resolve against it */
  filePath?: string;

  /** Absolute paths currently being expanded, outermost first */
  includeStack?: readonly string[];

  /** Shared state of the enclosing parse, for included content */
  session?: ParseSession;
}

export class ParseContext {
  readonly currentFilePath: string;
  readonly includeStack: readonly string[];
  readonly session: ParseSession;
  readonly elementStack: DocumentElement[] = [];

  private token: Token;

  constructor(
    public readonly tokenizer: TokenSource,
    options: ParseContextOptions = {}
  ) {
    this.currentFilePath = options.filePath ?? '';
    this.includeStack = options.includeStack ?? [];
    this.session = options.session ?? new ParseSession();
    this.token = tokenizer.nextToken();
  }

  get currentToken(): Token {
    return this.token;
  }

  /** Document-wide attributes set by `:name: value` lines */
  get globalAttributes(): Map<string, string> {
    return this.session.attributes;
  }

  get atEnd(): boolean {
    return this.token.type === TokenType.EndOfFile;
  }

  /**
   * Move to the next token. Staying on EndOfFile is allowed.
   */
  advance(): Token {
    if (this.token.type !== TokenType.EndOfFile) {
      this.token = this.tokenizer.nextToken();
    }
    return this.token;
  }

  /**
   * Advance when the current token has `type`
   */
  accept(type: TokenType): boolean {
    if (this.token.type === type) {
      this.advance();
      return true;
    }
    return false;
  }

  /**
   * Advance past a token of `type`, or throw
   */
  expect(type: TokenType): Token {
    const token = this.token;
    if (token.type !== type) {
      throw new ParseError(
        `Expected ${type} but found ${token.type} at line ${token.line}, column ${token.column}`,
        token.line,
        token.column
      );
    }
    this.advance();
    return token;
  }

  /**
   * Skip NewLine and EmptyLine tokens
   */
  skipBlankLines(): void {
    while (this.token.type === TokenType.NewLine || this.token.type === TokenType.EmptyLine) {
      this.advance();
    }
  }

  pushElement(element: DocumentElement): void {
    this.elementStack.push(element);
  }

  popElement(): DocumentElement | null {
    return this.elementStack.pop() ?? null;
  }

  peekElement(): DocumentElement | null {
    return this.elementStack[this.elementStack.length - 1] ?? null;
  }
}
