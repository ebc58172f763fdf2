/**
 * Node factories and ownership helpers
 *
 * @since 2025-12-08
 */

import { generateSlug } from './slug.js';
import type {
  AdmonitionNode,
  AdmonitionType,
  AnchorNode,
  BlockQuoteNode,
  CellAlignment,
  CodeBlockNode,
  CrossReferenceNode,
  DescriptionListItemNode,
  DescriptionListNode,
  DocumentElement,
  DocumentHeader,
  DocumentNode,
  ElementBase,
  ElementType,
  EmphasisNode,
  ExampleNode,
  FootnoteNode,
  HighlightNode,
  ImageNode,
  InlineCodeNode,
  LinkNode,
  ListItemNode,
  ListNode,
  ListingNode,
  LiteralNode,
  OpenNode,
  ParagraphNode,
  PassthroughNode,
  SectionNode,
  SidebarNode,
  StrongNode,
  SubscriptNode,
  SuperscriptNode,
  TableCellNode,
  TableHeaderNode,
  TableNode,
  TableOfContentsNode,
  TableRowNode,
  TextNode,
  VerseNode,
} from './types.js';

/**
 * Create the shared part of a node
 */
export function createElementBase<T extends ElementType>(
  elementType: T,
  attributes: Record<string, string> = {}
): ElementBase<T> {
  return {
    elementType,
    attributes: new Map(Object.entries(attributes)),
    parent: null,
    children: [],
  };
}

/**
 * Append `child` to `parent`, detaching it from its previous owner first
 */
export function appendChild<P extends DocumentElement>(parent: P, child: DocumentElement): P {
  if (child === parent) {
    throw new Error('Cannot append an element to itself');
  }
  if (child.parent) {
    removeChild(child.parent, child);
  }
  parent.children.push(child);
  child.parent = parent;
  return parent;
}

/**
 * Remove `child` from `parent`. Returns false when it was not a child.
 */
export function removeChild(parent: DocumentElement, child: DocumentElement): boolean {
  const index = parent.children.indexOf(child);
  if (index === -1) return false;
  parent.children.splice(index, 1);
  child.parent = null;
  return true;
}

/**
 * Append several children in order
 */
export function appendChildren<P extends DocumentElement>(parent: P, children: Iterable<DocumentElement>): P {
  for (const child of [...children]) {
    appendChild(parent, child);
  }
  return parent;
}

// =============================================================================
// Document
// =============================================================================

export function createDocument(
  header: Partial<Omit<DocumentHeader, 'attributes'>> = {},
  source: DocumentNode['source'] = { hash: '', linesOfCode: 0 },
  uuid = ''
): DocumentNode {
  const base = createElementBase('document');
  return {
    ...base,
    uuid,
    header: { ...header, title: header.title ?? '', attributes: base.attributes },
    elements: base.children,
    source,
    diagnostics: [],
  };
}

// =============================================================================
// Blocks
// =============================================================================

export function createSection(title: string, level: number, id?: string): SectionNode {
  return { ...createElementBase('section'), title, level, id: id ?? generateSlug(title) };
}

/**
 * Paragraph over inline children; `text` is the plain-text fallback
 */
export function createParagraph(children: DocumentElement[] = [], text = ''): ParagraphNode {
  return appendChildren({ ...createElementBase('paragraph'), text }, children);
}

export function createList(listType: ListNode['listType'], startNumber = 1): ListNode {
  return { ...createElementBase('list'), listType, startNumber };
}

export function createListItem(text: string, level = 1, isCheckbox = false, isChecked = false): ListItemNode {
  return { ...createElementBase('list-item'), text, level, isCheckbox, isChecked };
}

export function createDescriptionList(): DescriptionListNode {
  return { ...createElementBase('description-list'), listType: 'definition' };
}

export function createDescriptionListItem(term: string, description: string): DescriptionListItemNode {
  return { ...createElementBase('description-list-item'), term, description };
}

export function createTable(): TableNode {
  const base = createElementBase('table');
  return { ...base, header: null, rows: base.children };
}

/**
 * Attach `header` as the table's header row group
 */
export function setTableHeader(table: TableNode, header: TableHeaderNode | null): TableNode {
  if (table.header) {
    table.header.parent = null;
  }
  table.header = header;
  if (header) {
    header.parent = table;
  }
  return table;
}

export function createTableHeader(): TableHeaderNode {
  return createElementBase('table-header');
}

export function createTableRow(isHeader = false): TableRowNode {
  return { ...createElementBase('table-row'), isHeader };
}

export function createTableCell(
  content: string,
  options: { colSpan?: number; rowSpan?: number; alignment?: CellAlignment; isHeader?: boolean } = {}
): TableCellNode {
  return {
    ...createElementBase('table-cell'),
    content,
    colSpan: options.colSpan ?? 1,
    rowSpan: options.rowSpan ?? 1,
    alignment: options.alignment ?? 'left',
    isHeader: options.isHeader ?? false,
  };
}

export function createCodeBlock(content: string, language?: string): CodeBlockNode {
  return { ...createElementBase('code-block'), content, language };
}

export function createListing(content: string, title?: string): ListingNode {
  return { ...createElementBase('listing'), content, title };
}

export function createLiteral(content: string, title?: string): LiteralNode {
  return { ...createElementBase('literal'), content, title };
}

export function createVerse(content: string, fields: { title?: string; author?: string; citation?: string } = {}): VerseNode {
  return { ...createElementBase('verse'), content, ...fields };
}

export function createPassthrough(content: string, substitutions?: string): PassthroughNode {
  return { ...createElementBase('passthrough'), content, substitutions };
}

export function createBlockQuote(content: string, attribution = '', cite = ''): BlockQuoteNode {
  return { ...createElementBase('blockquote'), content, attribution, cite };
}

export function createSidebar(title?: string): SidebarNode {
  return { ...createElementBase('sidebar'), title };
}

export function createExample(title?: string): ExampleNode {
  return { ...createElementBase('example'), title };
}

export function createOpen(title?: string, masqueradeType?: string): OpenNode {
  return { ...createElementBase('open'), title, masqueradeType };
}

export function createAdmonition(admonitionType: AdmonitionType, content: string, title?: string): AdmonitionNode {
  return { ...createElementBase('admonition'), admonitionType, content, title };
}

export function createTableOfContents(title: string, maxDepth: number): TableOfContentsNode {
  return { ...createElementBase('toc'), title, maxDepth, entries: [] };
}

// =============================================================================
// Inline
// =============================================================================

export function createText(text: string): TextNode {
  return { ...createElementBase('text'), text };
}

export function createEmphasis(text: string): EmphasisNode {
  return { ...createElementBase('emphasis'), text };
}

export function createStrong(text: string): StrongNode {
  return { ...createElementBase('strong'), text };
}

export function createHighlight(text: string): HighlightNode {
  return { ...createElementBase('highlight'), text };
}

export function createSuperscript(text: string): SuperscriptNode {
  return { ...createElementBase('superscript'), text };
}

export function createSubscript(text: string): SubscriptNode {
  return { ...createElementBase('subscript'), text };
}

export function createInlineCode(code: string): InlineCodeNode {
  return { ...createElementBase('inline-code'), code };
}

export function createLink(url: string, text: string, title?: string): LinkNode {
  return { ...createElementBase('link'), url, text, title };
}

export function createImage(src: string, alt: string, title?: string): ImageNode {
  return { ...createElementBase('image'), src, alt, title };
}

export function createAnchor(id: string, label = ''): AnchorNode {
  return { ...createElementBase('anchor'), id, label };
}

export function createCrossReference(targetId: string, linkText = ''): CrossReferenceNode {
  return { ...createElementBase('cross-reference'), targetId, linkText };
}

export function createFootnote(id: string, text: string, referenceLabel: string, isReference = false): FootnoteNode {
  return { ...createElementBase('footnote'), id, text, referenceLabel, isReference };
}
