/**
 * Types for the AsciiDoc tokenizer
 *
 * The tokenizer classifies whole lines. Each token carries the kind of line
 * it recognised and the raw (trimmed) line text.
 *
 * @since 2025-12-08
 */

/**
 * Kind of a token
 */
export enum TokenType {
  Header = 'Header',
  ListItem = 'ListItem',
  DescriptionListItem = 'DescriptionListItem',
  TableDelimiter = 'TableDelimiter',
  TableRow = 'TableRow',
  BlockQuoteDelimiter = 'BlockQuoteDelimiter',
  SidebarDelimiter = 'SidebarDelimiter',
  ExampleDelimiter = 'ExampleDelimiter',
  OpenDelimiter = 'OpenDelimiter',
  VerseDelimiter = 'VerseDelimiter',
  LiteralDelimiter = 'LiteralDelimiter',
  PassthroughDelimiter = 'PassthroughDelimiter',
  CodeBlockDelimiter = 'CodeBlockDelimiter',
  AttributeLine = 'AttributeLine',
  AttributeBlockLine = 'AttributeBlockLine',
  VerseAttribute = 'VerseAttribute',
  LiteralAttribute = 'LiteralAttribute',
  ListingAttribute = 'ListingAttribute',
  PassthroughAttribute = 'PassthroughAttribute',
  AdmonitionBlock = 'AdmonitionBlock',
  TableOfContents = 'TableOfContents',
  BlockMacro = 'BlockMacro',
  Text = 'Text',
  EmptyLine = 'EmptyLine',
  NewLine = 'NewLine',
  EndOfFile = 'EndOfFile',
}

/**
 * A classified line (or newline / end marker)
 */
export interface Token {
  type: TokenType;

  /** Trimmed line text; "\n" for NewLine, "" for EmptyLine and EndOfFile */
  value: string;

  /** 1-based line number, taken after the token was read */
  line: number;

  /** 1-based column, taken after the token was read */
  column: number;

  /** 0-based offset into the input, taken after the token was read */
  position: number;
}

/**
 * Anything that hands out tokens one at a time
 */
export interface TokenSource {
  nextToken(): Token;
}

/**
 * Ordered line rule: the first rule whose pattern matches the trimmed line wins
 */
export interface LineRule {
  type: TokenType;
  pattern: RegExp;
}
