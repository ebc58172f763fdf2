/**
 * AsciiDoc Parser
 *
 * Recursive-descent parser over the line tokens of AsciiDocTokenizer.
 * `parseElementFromContext` dispatches on the current token; every block
 * routine consumes its whole construct and leaves the cursor on the first
 * token after it. Callers advance by themselves only when the dispatcher
 * returns null.
 *
 * Blocks that never see their closing delimiter end at the end of input
 * with what was collected so far (an `unclosed-block` diagnostic is added).
 *
 * @since 2025-12-08
 */

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IncludeProcessor } from '../include/IncludeProcessor.js';
import { splitLines } from '../include/contentFilters.js';
import { DocumentTree } from '../model/DocumentTree.js';
import {
  appendChild,
  appendChildren,
  createAdmonition,
  createBlockQuote,
  createCodeBlock,
  createDescriptionList,
  createDescriptionListItem,
  createDocument,
  createExample,
  createList,
  createListItem,
  createListing,
  createLiteral,
  createOpen,
  createParagraph,
  createPassthrough,
  createSection,
  createSidebar,
  createTable,
  createTableCell,
  createTableHeader,
  createTableOfContents,
  createTableRow,
  createText,
  createVerse,
  setTableHeader,
} from '../model/elements.js';
import { createMacroElement } from '../model/macros.js';
import type {
  AdmonitionNode,
  AdmonitionType,
  BlockQuoteNode,
  CodeBlockNode,
  DescriptionListItemNode,
  DescriptionListNode,
  DocumentElement,
  DocumentNode,
  ExampleNode,
  IncludeMacroNode,
  ListItemNode,
  ListNode,
  ListingNode,
  LiteralNode,
  OpenNode,
  ParagraphNode,
  PassthroughNode,
  SectionNode,
  SidebarNode,
  TableNode,
  TableOfContentsNode,
  TableRowNode,
  VerseNode,
} from '../model/types.js';
import { TokenType, type Token } from '../tokenizer/types.js';
import { AsciiDocTokenizer } from '../tokenizer/AsciiDocTokenizer.js';
import { ParseError } from './errors.js';
import { parseMacroParameters, splitMacroParameters } from './macroParameters.js';
import { ParseContext } from './ParseContext.js';
import { ParseSession } from './ParseSession.js';
import { resolveParserOptions, type ParserOptions } from './types.js';

const HEADER_PATTERN = /^(=+)\s+(.+)$/;
const LIST_ITEM_PATTERN = /^(\*+|\d+\.)\s+(\[[ xX]\]\s+)?(.+)$/;
const DESCRIPTION_ITEM_PATTERN = /^([^:[\]]+)::\s*(.*)$/;
const ATTRIBUTE_LINE_PATTERN = /^:([^:!]+)(!?):\s*(.*)$/;
const ATTRIBUTE_BLOCK_PATTERN = /^\[([^\]]+)\]$/;
const CODE_DELIMITER_PATTERN = /^----(\w+)?$/;
const SOURCE_ATTRIBUTE_PATTERN = /^source(?:,\s*(\w+))?/i;
const ADMONITION_PATTERN = /^(NOTE|TIP|IMPORTANT|WARNING|CAUTION):\s*(.*)$/;
const VERSE_ATTRIBUTE_PATTERN = /^\[verse(?:,\s*([^,\]]+))?(?:,\s*([^\]]+))?\]$/;
const QUOTE_ATTRIBUTE_PATTERN = /^\[quote(?:,\s*([^,\]]+))?(?:,\s*([^\]]+))?\]$/;
const BLOCK_MACRO_PATTERN = /^(\w+)::([^[]*)\[([^\]]*)\]$/;
const TOC_PATTERN = /^toc::\s*\[([^\]]*)\]$/;
const AUTHOR_LINE_PATTERN = /^([^<]+?)\s*(?:<([^>]+)>)?$/;
const REVISION_LINE_PATTERN = /^v?(\d[^,:]*?)\s*(?:,\s*([^:]+?))?\s*(?::\s*(.+))?$/;

const ADMONITION_TYPES: ReadonlySet<string> = new Set(['NOTE', 'TIP', 'IMPORTANT', 'WARNING', 'CAUTION']);

const DEFAULT_TOC_TITLE = 'Table of Contents';
const DEFAULT_TOC_LEVELS = 3;

/**
 * Style and named attributes of a block attribute line (`[source,ts]`, `[%header]`)
 */
interface BlockAttributes {
  /** Raw text between the brackets */
  raw: string;
  /** First positional value without options, e.g. `source` */
  style: string;
  /** Positional values after the style */
  positional: string[];
  /** `key=value` pairs */
  named: Map<string, string>;
  /** `%opt` shorthands plus `options=`/`opts=` values */
  options: Set<string>;
}

export class AsciiDocParser {
  private readonly defaults: ParserOptions;
  private readonly includeProcessor: IncludeProcessor;

  constructor(options: ParserOptions = {}) {
    this.defaults = options;
    this.includeProcessor = new IncludeProcessor(this);
  }

  /**
   * Parse a whole document
   */
  parse(text: string, options: ParserOptions = {}): DocumentNode {
    if (typeof text !== 'string' || text.length === 0) {
      throw new ParseError('Input cannot be null or empty');
    }
    const resolved = resolveParserOptions({ ...this.defaults, ...options });
    return this.parseDocument(text, new ParseSession(resolved), resolved.basePath, []);
  }

  /**
   * Read and parse a file. Includes resolve against the file's directory
   * unless `basePath` is given.
   */
  parseFile(filePath: string, options: ParserOptions = {}): DocumentNode {
    if (!filePath) {
      throw new ParseError('File path cannot be null or empty');
    }
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      throw new ParseError(`File not found: ${absolutePath}`);
    }

    const content = fs.readFileSync(absolutePath, 'utf8');
    if (content.length === 0) {
      throw new ParseError(`File is empty: ${absolutePath}`);
    }

    const resolved = resolveParserOptions({ ...this.defaults, ...options });
    const basePath = resolved.basePath || absolutePath;
    const document = this.parseDocument(content, new ParseSession(resolved), basePath, [absolutePath]);
    document.source.file = absolutePath;
    return document;
  }

  /**
   * Parse one fragment in isolation; null when it yields no element
   */
  parseElement(text: string, options: ParserOptions = {}): DocumentElement | null {
    if (!text) return null;
    const session = new ParseSession(resolveParserOptions({ ...this.defaults, ...options }));
    const context = new ParseContext(new AsciiDocTokenizer(text), { filePath: session.options.basePath, session });
    context.skipBlankLines();
    return this.parseElementFromContext(context);
  }

  /**
   * Dispatch on the current token
   */
  parseElementFromContext(context: ParseContext): DocumentElement | null {
    const token = context.currentToken;

    switch (token.type) {
      case TokenType.Header:
        return this.parseSectionTitle(context);
      case TokenType.ListItem:
        return this.parseList(context);
      case TokenType.DescriptionListItem:
        return this.parseDescriptionList(context);
      case TokenType.TableDelimiter:
        return this.parseTable(context, false);
      case TokenType.BlockQuoteDelimiter:
        return this.parseBlockQuote(context);
      case TokenType.SidebarDelimiter:
        return this.parseContainer(context, createSidebar());
      case TokenType.ExampleDelimiter:
        return this.parseContainer(context, createExample());
      case TokenType.OpenDelimiter:
        return this.parseContainer(context, createOpen());
      case TokenType.VerseDelimiter:
        return this.parseVerse(context, {});
      case TokenType.VerseAttribute:
        return this.parseVerseAttribute(context);
      case TokenType.LiteralDelimiter:
        return this.parseLiteral(context);
      case TokenType.LiteralAttribute:
        return this.parseStyledBlockAfter(context, 'literal');
      case TokenType.ListingAttribute:
        return this.parseStyledBlockAfter(context, 'listing');
      case TokenType.PassthroughAttribute:
        return this.parseStyledBlockAfter(context, 'pass');
      case TokenType.PassthroughDelimiter:
        return this.parsePassthrough(context);
      case TokenType.AttributeLine:
        this.applyAttributeLine(context);
        return null;
      case TokenType.AttributeBlockLine:
        return this.parseAttributeBlockElement(context);
      case TokenType.AdmonitionBlock:
        return this.parseAdmonition(context);
      case TokenType.TableOfContents:
        return this.parseTableOfContents(context);
      case TokenType.BlockMacro:
        return this.parseBlockMacro(context);
      case TokenType.Text:
        return this.parseParagraph(context);
      case TokenType.CodeBlockDelimiter:
        return this.parseCodeBlock(context);
      case TokenType.TableRow:
      case TokenType.EmptyLine:
      case TokenType.NewLine:
      case TokenType.EndOfFile:
        return null;
      default: {
        const unhandled: never = token.type;
        return unhandled;
      }
    }
  }

  // ===========================================================================
  // Document
  // ===========================================================================

  private parseDocument(
    text: string,
    session: ParseSession,
    filePath: string,
    includeStack: readonly string[]
  ): DocumentNode {
    const context = new ParseContext(new AsciiDocTokenizer(text), { filePath, includeStack, session });
    const document = createDocument(
      {},
      {
        hash: createHash('sha256').update(text).digest('hex').slice(0, 16),
        linesOfCode: splitLines(text).length,
      },
      uuidv4()
    );

    context.pushElement(document);
    context.skipBlankLines();
    this.parseDocumentHeader(context, document);

    while (!context.atEnd) {
      const element = this.parseElementFromContext(context);
      if (element) {
        appendChild(document, element);
      } else {
        context.advance();
      }
    }
    context.popElement();

    for (const [name, value] of context.globalAttributes) {
      document.attributes.set(name, value);
    }
    this.applyHeaderAttributes(document);
    document.diagnostics.push(...session.diagnostics);

    if (session.options.generateToc) {
      this.fillTableOfContents(document);
    }

    return document;
  }

  /**
   * `= Title`, then optionally an author line and a revision line
   */
  private parseDocumentHeader(context: ParseContext, document: DocumentNode): void {
    const token = context.currentToken;
    if (token.type !== TokenType.Header) return;

    const match = HEADER_PATTERN.exec(token.value);
    if (!match || match[1].length !== 1) return;

    document.header.title = match[2].trim();
    context.advance();

    const author = this.readHeaderLine(context, AUTHOR_LINE_PATTERN);
    if (!author) return;
    context.globalAttributes.set('author', author[1].trim());
    if (author[2]) context.globalAttributes.set('email', author[2].trim());

    const revision = this.readHeaderLine(context, REVISION_LINE_PATTERN);
    if (!revision) return;
    context.globalAttributes.set('revnumber', revision[1].trim());
    if (revision[2]) context.globalAttributes.set('revdate', revision[2].trim());
    if (revision[3]) context.globalAttributes.set('revremark', revision[3].trim());
  }

  /**
   * Match `pattern` against the line directly below the current one and consume it on a match.
   * A line that does not match stays for the body.
   */
  private readHeaderLine(context: ParseContext, pattern: RegExp): RegExpExecArray | null {
    if (!context.accept(TokenType.NewLine)) return null;
    const token = context.currentToken;
    if (token.type !== TokenType.Text) return null;
    const match = pattern.exec(token.value);
    if (match) context.advance();
    return match;
  }

  private applyHeaderAttributes(document: DocumentNode): void {
    const { header, attributes } = document;
    header.author = attributes.get('author') ?? header.author;
    header.email = attributes.get('email') ?? header.email;
    header.revision = attributes.get('revnumber') ?? header.revision;
    header.date = attributes.get('revdate') ?? header.date;
  }

  /**
   * Fill every `toc::[]` with the document's titled sections
   */
  private fillTableOfContents(document: DocumentNode): void {
    const tree = new DocumentTree(document);
    for (const toc of tree.findElements('toc')) {
      toc.entries = tree.buildOutline(toc.maxDepth);
    }
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  /**
   * `:name: value` sets, `:name:` sets "true", `:name!:` sets "false".
   * Does not advance.
   */
  private applyAttributeLine(context: ParseContext): void {
    const match = ATTRIBUTE_LINE_PATTERN.exec(context.currentToken.value);
    if (!match) return;

    const name = match[1].trim();
    const unset = match[2] === '!';
    const value = match[3].trim();
    context.globalAttributes.set(name, unset ? 'false' : value || 'true');
  }

  private parseBlockAttributes(raw: string): BlockAttributes {
    const attributes: BlockAttributes = { raw, style: '', positional: [], named: new Map(), options: new Set() };

    splitMacroParameters(raw).forEach((part, index) => {
      const value = part.trim();
      if (!value) return;

      const equalIndex = value.indexOf('=');
      if (equalIndex > 0) {
        const key = value.slice(0, equalIndex).trim();
        const named = parseMacroParameters(value).get(key) ?? '';
        attributes.named.set(key, named);
        if (key === 'options' || key === 'opts') {
          addOptions(attributes.options, named.split(','));
        }
      } else if (index === 0) {
        // `source%linenums`, `%header`
        const [style, ...options] = value.split('%');
        attributes.style = style.trim();
        addOptions(attributes.options, options);
      } else {
        attributes.positional.push(value);
      }
    });

    return attributes;
  }

  /**
   * Element introduced by a `[...]` line, chosen from its style and the
   * token that follows it
   */
  private parseAttributeBlockElement(context: ParseContext): DocumentElement {
    const token = context.currentToken;
    const match = ATTRIBUTE_BLOCK_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid attribute block: ${token.value}`, token.line, token.column);
    }

    const attributes = this.parseBlockAttributes(match[1]);
    context.advance();
    context.skipBlankLines();

    const element = this.parseStyledBlock(context, token, attributes);
    if (element) {
      this.applyBlockAttributes(element, attributes);
      return element;
    }

    if (context.currentToken.type === TokenType.Text) {
      const paragraph = this.parseParagraph(context);
      this.applyBlockAttributes(paragraph, attributes);
      return paragraph;
    }

    // Nothing to attach to: keep the bracketed text
    return createParagraph([createText(attributes.raw)], attributes.raw);
  }

  /**
   * Block for a known style, or null when the following token does not fit
   */
  private parseStyledBlock(context: ParseContext, token: Token, attributes: BlockAttributes): DocumentElement | null {
    const next = context.currentToken.type;
    const style = attributes.style.toLowerCase();

    const verse = VERSE_ATTRIBUTE_PATTERN.exec(token.value);
    if (verse) {
      const fields = { author: verse[1]?.trim(), citation: verse[2]?.trim() };
      if (next === TokenType.BlockQuoteDelimiter || next === TokenType.VerseDelimiter) {
        return this.parseVerse(context, fields);
      }
      if (next === TokenType.Text) {
        return createVerse(this.collectParagraphLines(context).join('\n'), fields);
      }
    }

    const quote = QUOTE_ATTRIBUTE_PATTERN.exec(token.value);
    if (quote && next === TokenType.BlockQuoteDelimiter) {
      const blockQuote = this.parseBlockQuote(context);
      blockQuote.attribution = quote[1]?.trim() || blockQuote.attribution;
      blockQuote.cite = quote[2]?.trim() ?? blockQuote.cite;
      return blockQuote;
    }

    if (style === 'literal' || style === 'listing' || style === 'pass') {
      return this.parseKeywordBlock(context, style, attributes);
    }

    if (next === TokenType.CodeBlockDelimiter) {
      const source = SOURCE_ATTRIBUTE_PATTERN.exec(attributes.raw);
      if (source) {
        return this.parseCodeBlockWithLanguage(context, source[1]);
      }
    }

    if (ADMONITION_TYPES.has(attributes.style)) {
      const type = toAdmonitionType(attributes.style);
      if (next === TokenType.ExampleDelimiter) {
        const { lines } = this.collectDelimitedLines(context);
        return createAdmonition(type, trimBlankLines(lines).join('\n'));
      }
      if (next === TokenType.Text) {
        return createAdmonition(type, this.collectParagraphLines(context).join('\n'));
      }
    }

    if (next === TokenType.TableDelimiter) {
      return this.parseTable(context, attributes.options.has('header'));
    }

    if (next === TokenType.OpenDelimiter) {
      return this.parseContainer(context, createOpen(undefined, attributes.style || undefined));
    }

    return null;
  }

  /**
   * Token-level `[literal]`, `[listing]` and `[pass]` lines
   */
  private parseStyledBlockAfter(context: ParseContext, style: 'literal' | 'listing' | 'pass'): DocumentElement {
    const token = context.currentToken;
    const raw = ATTRIBUTE_BLOCK_PATTERN.exec(token.value)?.[1] ?? style;
    context.advance();
    context.skipBlankLines();
    return this.parseKeywordBlock(context, style, this.parseBlockAttributes(raw));
  }

  private parseKeywordBlock(
    context: ParseContext,
    style: 'literal' | 'listing' | 'pass',
    attributes: BlockAttributes
  ): LiteralNode | ListingNode | PassthroughNode {
    const next = context.currentToken.type;

    switch (style) {
      case 'literal':
        if (next === TokenType.LiteralDelimiter) return this.parseLiteral(context);
        return createLiteral(next === TokenType.Text ? this.collectParagraphLines(context).join('\n') : '');
      case 'listing':
        if (next === TokenType.CodeBlockDelimiter) {
          const { lines } = this.collectDelimitedLines(context);
          return createListing(trimBlankLines(lines).join('\n'));
        }
        return createListing(next === TokenType.Text ? this.collectParagraphLines(context).join('\n') : '');
      case 'pass': {
        const substitutions = attributes.named.get('subs');
        if (next === TokenType.PassthroughDelimiter) {
          const passthrough = this.parsePassthrough(context);
          passthrough.substitutions = substitutions;
          return passthrough;
        }
        return createPassthrough(
          next === TokenType.Text ? this.collectParagraphLines(context).join('\n') : '',
          substitutions
        );
      }
    }
  }

  private applyBlockAttributes(element: DocumentElement, attributes: BlockAttributes): void {
    if (attributes.style) {
      element.attributes.set('style', attributes.style);
    }
    for (const [name, value] of attributes.named) {
      element.attributes.set(name, value);
    }
    if (attributes.options.size > 0) {
      element.attributes.set('options', [...attributes.options].join(','));
    }
  }

  // ===========================================================================
  // Line collection
  // ===========================================================================

  /**
   * Lines between the current opening delimiter and its closing twin
   * (same token type), consumed. Blank lines are kept as empty strings.
   */
  private collectDelimitedLines(context: ParseContext): { lines: string[]; closed: boolean } {
    const opening = context.currentToken;
    const lines: string[] = [];
    let atLineStart = false;

    context.advance();
    while (!context.atEnd) {
      const token = context.currentToken;

      if (token.type === opening.type) {
        context.advance();
        return { lines, closed: true };
      }

      if (token.type === TokenType.NewLine) {
        if (atLineStart) lines.push('');
        atLineStart = true;
      } else if (token.type === TokenType.EmptyLine) {
        lines.push('');
        atLineStart = false;
      } else {
        lines.push(token.value);
        atLineStart = false;
      }
      context.advance();
    }

    this.reportUnclosed(context, opening);
    return { lines, closed: false };
  }

  /**
   * The current text line plus the lines directly below it, consumed.
   * Stops at a blank line or at any non-text line.
   */
  private collectParagraphLines(context: ParseContext): string[] {
    const lines = [context.currentToken.value];
    context.advance();
    lines.push(...this.readContinuationLines(context));
    return lines;
  }

  /**
   * Text lines directly following the line just consumed
   */
  private readContinuationLines(context: ParseContext): string[] {
    const lines: string[] = [];
    while (context.currentToken.type === TokenType.NewLine) {
      context.advance();
      const token = context.currentToken;
      if (token.type !== TokenType.Text) break;
      lines.push(token.value);
      context.advance();
    }
    return lines;
  }

  private reportUnclosed(context: ParseContext, opening: Token): void {
    const message = `Unclosed ${opening.type} '${opening.value}' opened at line ${opening.line}`;
    context.session.report('unclosed-block', message, opening, context.currentFilePath);
  }

  // ===========================================================================
  // Blocks
  // ===========================================================================

  private parseSectionTitle(context: ParseContext): SectionNode {
    const token = context.currentToken;
    const match = HEADER_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid header format: ${token.value}`, token.line, token.column);
    }
    context.advance();
    return createSection(match[2].trim(), match[1].length);
  }

  private parseParagraph(context: ParseContext): ParagraphNode {
    const text = this.collectParagraphLines(context).join('\n').trim();
    const inline = context.session.inline;
    const children = inline.parse(text);
    return createParagraph(children, inline.toPlainText(children));
  }

  private parseListItem(context: ParseContext): ListItemNode {
    const token = context.currentToken;
    const match = LIST_ITEM_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid list item format: ${token.value}`, token.line, token.column);
    }

    const marker = match[1];
    const checkbox = match[2] ?? '';
    const isCheckbox = checkbox !== '';
    const isChecked = isCheckbox && checkbox.trim().slice(1, -1).trim().toLowerCase() === 'x';
    const level = marker.startsWith('*') ? marker.length : 1;

    context.advance();
    return createListItem(match[3].trim(), level, isCheckbox, isChecked);
  }

  private parseList(context: ParseContext): ListNode {
    const marker = LIST_ITEM_PATTERN.exec(context.currentToken.value)?.[1] ?? '*';
    const ordered = /^\d+\.$/.test(marker);
    const list = createList(ordered ? 'ordered' : 'unordered', ordered ? Number.parseInt(marker, 10) : 1);

    appendChild(list, this.parseListItem(context));
    for (;;) {
      context.skipBlankLines();
      if (context.currentToken.type !== TokenType.ListItem) break;
      appendChild(list, this.parseListItem(context));
    }

    return list;
  }

  private parseDescriptionListItem(context: ParseContext): DescriptionListItemNode {
    const token = context.currentToken;
    const match = DESCRIPTION_ITEM_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid description list item format: ${token.value}`, token.line, token.column);
    }

    context.advance();
    return createDescriptionListItem(match[1].trim(), match[2].trim());
  }

  private parseDescriptionList(context: ParseContext): DescriptionListNode {
    const list = createDescriptionList();

    appendChild(list, this.parseDescriptionListItem(context));
    for (;;) {
      context.skipBlankLines();
      if (context.currentToken.type !== TokenType.DescriptionListItem) break;
      appendChild(list, this.parseDescriptionListItem(context));
    }

    return list;
  }

  /**
   * `|===` ... `|===`; with `withHeader` the first row becomes the header
   */
  private parseTable(context: ParseContext, withHeader: boolean): TableNode {
    const opening = context.currentToken;
    const table = createTable();
    context.advance();

    for (;;) {
      const token = context.currentToken;
      if (token.type === TokenType.EndOfFile) {
        this.reportUnclosed(context, opening);
        break;
      }
      if (token.type === TokenType.TableDelimiter) {
        context.advance();
        break;
      }
      if (token.type === TokenType.TableRow) {
        const isHeader = withHeader && table.header === null;
        const row = this.parseTableRow(token.value, isHeader);
        if (isHeader) {
          setTableHeader(table, appendChild(createTableHeader(), row));
        } else {
          appendChild(table, row);
        }
      }
      context.advance();
    }

    return table;
  }

  private parseTableRow(value: string, isHeader: boolean): TableRowNode {
    const row = createTableRow(isHeader);
    const content = value.startsWith('|') ? value.slice(1) : value;

    for (const cell of content.split('|')) {
      const text = cell.trim();
      if (text) {
        appendChild(row, createTableCell(text, { isHeader }));
      }
    }
    return row;
  }

  private parseBlockQuote(context: ParseContext): BlockQuoteNode {
    const { lines } = this.collectDelimitedLines(context);
    let attribution = '';
    const content: string[] = [];

    for (const line of lines) {
      if (line.startsWith('-- ')) {
        attribution = line.slice(3).trim();
      } else {
        content.push(line);
      }
    }

    return createBlockQuote(content.join('\n').trim(), attribution);
  }

  /**
   * Sidebar, example and open blocks: nested elements up to the closing delimiter
   */
  private parseContainer<T extends SidebarNode | ExampleNode | OpenNode>(context: ParseContext, container: T): T {
    const opening = context.currentToken;
    context.advance();

    for (;;) {
      const token = context.currentToken;
      if (token.type === TokenType.EndOfFile) {
        this.reportUnclosed(context, opening);
        break;
      }
      if (token.type === opening.type) {
        context.advance();
        break;
      }
      if (token.type === TokenType.NewLine || token.type === TokenType.EmptyLine) {
        context.advance();
        continue;
      }

      const element = this.parseElementFromContext(context);
      if (element) {
        appendChild(container, element);
      } else {
        context.advance();
      }
    }

    return container;
  }

  private parseVerse(context: ParseContext, fields: { title?: string; author?: string; citation?: string }): VerseNode {
    const { lines } = this.collectDelimitedLines(context);
    return createVerse(lines.join('\n'), fields);
  }

  /**
   * Token-level `[verse, author, citation]` line
   */
  private parseVerseAttribute(context: ParseContext): VerseNode {
    const match = VERSE_ATTRIBUTE_PATTERN.exec(context.currentToken.value);
    const fields = { author: match?.[1]?.trim(), citation: match?.[2]?.trim() };
    context.advance();
    context.skipBlankLines();

    const next = context.currentToken.type;
    if (next === TokenType.BlockQuoteDelimiter || next === TokenType.VerseDelimiter) {
      return this.parseVerse(context, fields);
    }
    if (next === TokenType.Text) {
      return createVerse(this.collectParagraphLines(context).join('\n'), fields);
    }
    return createVerse('', fields);
  }

  private parseLiteral(context: ParseContext): LiteralNode {
    const { lines } = this.collectDelimitedLines(context);
    return createLiteral(trimBlankLines(lines).join('\n'));
  }

  private parsePassthrough(context: ParseContext): PassthroughNode {
    const { lines } = this.collectDelimitedLines(context);
    return createPassthrough(lines.join('\n'));
  }

  private parseCodeBlock(context: ParseContext): CodeBlockNode {
    const language = CODE_DELIMITER_PATTERN.exec(context.currentToken.value)?.[1];
    return this.parseCodeBlockWithLanguage(context, language);
  }

  private parseCodeBlockWithLanguage(context: ParseContext, language: string | undefined): CodeBlockNode {
    const delimiterLanguage = CODE_DELIMITER_PATTERN.exec(context.currentToken.value)?.[1];
    const { lines } = this.collectDelimitedLines(context);
    return createCodeBlock(trimBlankLines(lines).join('\n'), language ?? delimiterLanguage);
  }

  private parseAdmonition(context: ParseContext): AdmonitionNode {
    const token = context.currentToken;
    const match = ADMONITION_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid admonition format: ${token.value}`, token.line, token.column);
    }

    context.advance();
    return createAdmonition(toAdmonitionType(match[1]), match[2].trim());
  }

  /**
   * `toc::[title=...,levels=...]`; entries are filled once the whole document is parsed
   */
  private parseTableOfContents(context: ParseContext): TableOfContentsNode {
    const token = context.currentToken;
    const match = TOC_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid table of contents format: ${token.value}`, token.line, token.column);
    }

    const parameters = parseMacroParameters(match[1].trim());
    const levels = Number.parseInt(parameters.get('levels') ?? '', 10);
    context.advance();

    return createTableOfContents(
      parameters.get('title') ?? DEFAULT_TOC_TITLE,
      Number.isNaN(levels) ? DEFAULT_TOC_LEVELS : levels
    );
  }

  // ===========================================================================
  // Macros and includes
  // ===========================================================================

  private parseBlockMacro(context: ParseContext): DocumentElement {
    const token = context.currentToken;
    const match = BLOCK_MACRO_PATTERN.exec(token.value);
    if (!match) {
      throw new ParseError(`Invalid block macro format: ${token.value}`, token.line, token.column);
    }

    const macro = createMacroElement(
      match[1].trim(),
      match[2].trim(),
      parseMacroParameters(match[3].trim()),
      'block'
    );
    context.advance();

    if (macro.elementType === 'include-macro') {
      return this.expandInclude(macro, context, token);
    }
    return macro;
  }

  /**
   * One element for the include site: the macro itself when nothing was
   * included, the single element, or an untitled level-0 section around
   * several elements
   */
  private expandInclude(macro: IncludeMacroNode, context: ParseContext, token: Token): DocumentElement {
    const { session } = context;
    const outcome = this.includeProcessor.resolve(macro, context.currentFilePath, context.includeStack, session);

    switch (outcome.status) {
      case 'resolved': {
        const { elements } = outcome;
        if (elements.length === 0) return macro;
        if (elements.length === 1) return elements[0];
        return appendChildren(createSection('', 0), elements);
      }
      case 'skipped':
        session.report('include-skipped', outcome.reason, token, context.currentFilePath);
        session.warn(`${outcome.reason} (line ${token.line}), skipping optional include`);
        return macro;
      case 'failed':
        if (session.options.strictIncludes) {
          throw outcome.error;
        }
        session.report('include-failed', outcome.error.message, token, context.currentFilePath);
        session.warn(`${outcome.error.message} (line ${token.line}), keeping include directive`);
        return macro;
    }
  }
}

function addOptions(target: Set<string>, options: string[]): void {
  for (const option of options) {
    const name = option.trim();
    if (name) target.add(name);
  }
}

function toAdmonitionType(name: string): AdmonitionType {
  switch (name.toUpperCase()) {
    case 'TIP':
      return 'tip';
    case 'IMPORTANT':
      return 'important';
    case 'WARNING':
      return 'warning';
    case 'CAUTION':
      return 'caution';
    default:
      return 'note';
  }
}

/**
 * Drop empty lines at both ends
 */
function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end);
}
