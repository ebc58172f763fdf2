/**
 * Types for the AsciiDoc document tree
 *
 * Every node shares the same shape (element type, attributes, parent,
 * children). The element type is the discriminant of a closed union, so a
 * `switch` over `elementType` is checked for exhaustiveness by the compiler.
 *
 * Parent links are non-owning and only maintained by `appendChild` /
 * `removeChild` (see elements.ts).
 *
 * @since 2025-12-08
 */

/**
 * Discriminant of every node kind
 */
export type ElementType =
  // Blocks
  | 'document'
  | 'section'
  | 'paragraph'
  | 'list'
  | 'list-item'
  | 'description-list'
  | 'description-list-item'
  | 'table'
  | 'table-header'
  | 'table-row'
  | 'table-cell'
  | 'code-block'
  | 'listing'
  | 'literal'
  | 'verse'
  | 'passthrough'
  | 'blockquote'
  | 'sidebar'
  | 'example'
  | 'open'
  | 'admonition'
  | 'toc'
  // Macros
  | 'macro'
  | 'image-macro'
  | 'video-macro'
  | 'include-macro'
  // Inline
  | 'text'
  | 'emphasis'
  | 'strong'
  | 'highlight'
  | 'superscript'
  | 'subscript'
  | 'inline-code'
  | 'link'
  | 'image'
  | 'anchor'
  | 'cross-reference'
  | 'footnote';

/**
 * Capabilities shared by all nodes
 */
export interface ElementBase<T extends ElementType> {
  readonly elementType: T;

  /** Element-scoped attributes */
  attributes: Map<string, string>;

  /** Owning node, or null for the root and for detached nodes */
  parent: DocumentElement | null;

  /** Owned, ordered child nodes */
  children: DocumentElement[];
}

// =============================================================================
// Document
// =============================================================================

export interface DocumentHeader {
  title: string;
  author?: string;
  email?: string;
  revision?: string;
  date?: string;

  /** Same map as the owning document's attributes */
  attributes: Map<string, string>;
}

/**
 * Where a parsed document came from
 */
export interface DocumentSource {
  /** Absolute path when parsed from a file */
  file?: string;

  /** Content hash for change detection */
  hash: string;

  linesOfCode: number;
}

export type DiagnosticKind = 'unclosed-block' | 'include-failed' | 'include-skipped';

/**
 * Non-fatal problem found while parsing
 */
export interface ParseDiagnostic {
  kind: DiagnosticKind;
  message: string;
  line: number;
  column: number;
  /** File the problem was found in (empty for in-memory input) */
  file: string;
}

export interface DocumentNode extends ElementBase<'document'> {
  /** Unique identifier */
  uuid: string;
  header: DocumentHeader;

  /** Top-level elements (same array as `children`) */
  elements: DocumentElement[];

  source: DocumentSource;
  diagnostics: ParseDiagnostic[];
}

// =============================================================================
// Blocks
// =============================================================================

export interface SectionNode extends ElementBase<'section'> {
  title: string;

  /** 1+ for real sections; 0 marks an untitled container around included elements */
  level: number;

  /** Anchor id derived from the title */
  id: string;
}

export interface ParagraphNode extends ElementBase<'paragraph'> {
  /** Plain-text fallback of the inline children */
  text: string;
}

export type ListType = 'ordered' | 'unordered' | 'definition';

export interface ListNode extends ElementBase<'list'> {
  listType: Exclude<ListType, 'definition'>;
  startNumber: number;
}

export interface ListItemNode extends ElementBase<'list-item'> {
  text: string;
  level: number;
  isCheckbox: boolean;
  isChecked: boolean;
}

export interface DescriptionListNode extends ElementBase<'description-list'> {
  readonly listType: 'definition';
}

export interface DescriptionListItemNode extends ElementBase<'description-list-item'> {
  term: string;
  description: string;
}

export type CellAlignment = 'left' | 'center' | 'right';

export interface TableCellNode extends ElementBase<'table-cell'> {
  content: string;
  colSpan: number;
  rowSpan: number;
  alignment: CellAlignment;
  isHeader: boolean;
}

export interface TableRowNode extends ElementBase<'table-row'> {
  isHeader: boolean;
}

export interface TableHeaderNode extends ElementBase<'table-header'> {}

export interface TableNode extends ElementBase<'table'> {
  /** Header row, only set when the table is declared with the `header` option */
  header: TableHeaderNode | null;

  /** Body rows (same array as `children`) */
  rows: DocumentElement[];
}

export interface CodeBlockNode extends ElementBase<'code-block'> {
  content: string;
  language?: string;
}

export interface ListingNode extends ElementBase<'listing'> {
  content: string;
  title?: string;
}

export interface LiteralNode extends ElementBase<'literal'> {
  content: string;
  title?: string;
}

export interface VerseNode extends ElementBase<'verse'> {
  content: string;
  title?: string;
  author?: string;
  citation?: string;
}

export interface PassthroughNode extends ElementBase<'passthrough'> {
  content: string;
  /** Substitutions to apply, when declared (e.g. `[pass,subs=quotes]`) */
  substitutions?: string;
}

export interface BlockQuoteNode extends ElementBase<'blockquote'> {
  content: string;
  attribution: string;
  cite: string;
}

export interface SidebarNode extends ElementBase<'sidebar'> {
  title?: string;
}

export interface ExampleNode extends ElementBase<'example'> {
  title?: string;
}

export interface OpenNode extends ElementBase<'open'> {
  title?: string;
  /** Role the open block stands in for, from a leading `[sidebar]`-style attribute block */
  masqueradeType?: string;
}

export type AdmonitionType = 'note' | 'tip' | 'important' | 'warning' | 'caution';

export interface AdmonitionNode extends ElementBase<'admonition'> {
  admonitionType: AdmonitionType;
  content: string;
  title?: string;
}

export interface TableOfContentsEntry {
  title: string;
  level: number;
  anchorId: string;
  children: TableOfContentsEntry[];
}

export interface TableOfContentsNode extends ElementBase<'toc'> {
  title: string;
  maxDepth: number;
  entries: TableOfContentsEntry[];
}

// =============================================================================
// Macros
// =============================================================================

export type MacroType = 'block' | 'inline';

interface MacroFields {
  name: string;
  target: string;
  parameters: Map<string, string>;
  macroType: MacroType;
}

export interface MacroNode extends ElementBase<'macro'>, MacroFields {}

export interface ImageMacroNode extends ElementBase<'image-macro'>, MacroFields {
  source: string;
  alt: string;
  title?: string;
  width?: number;
  height?: number;
  link?: string;
  align?: string;
  float?: string;
}

export interface VideoMacroNode extends ElementBase<'video-macro'>, MacroFields {
  source: string;
  title?: string;
  width?: number;
  height?: number;
  poster?: string;
  autoplay: boolean;
  controls: boolean;
  loop: boolean;
  muted: boolean;
  /** Explicit `format`, else guessed from the extension */
  videoFormat: string;
}

export interface IncludeMacroNode extends ElementBase<'include-macro'>, MacroFields {
  filePath: string;
  /** Raw `leveloffset` value, e.g. "+1" */
  levelOffset?: string;
  /** Raw `lines` value, e.g. "2..3,7" */
  lines?: string;
  /** Raw `tags` value, e.g. "intro,setup" */
  tags?: string;
  /** Raw `indent` value */
  indent?: string;
  optional: boolean;
}

// =============================================================================
// Inline
// =============================================================================

export interface TextNode extends ElementBase<'text'> {
  text: string;
}

export interface EmphasisNode extends ElementBase<'emphasis'> {
  text: string;
}

export interface StrongNode extends ElementBase<'strong'> {
  text: string;
}

export interface HighlightNode extends ElementBase<'highlight'> {
  text: string;
}

export interface SuperscriptNode extends ElementBase<'superscript'> {
  text: string;
}

export interface SubscriptNode extends ElementBase<'subscript'> {
  text: string;
}

export interface InlineCodeNode extends ElementBase<'inline-code'> {
  code: string;
}

export interface LinkNode extends ElementBase<'link'> {
  url: string;
  text: string;
  title?: string;
}

export interface ImageNode extends ElementBase<'image'> {
  src: string;
  alt: string;
  title?: string;
}

export interface AnchorNode extends ElementBase<'anchor'> {
  id: string;
  label: string;
}

export interface CrossReferenceNode extends ElementBase<'cross-reference'> {
  targetId: string;
  linkText: string;
}

export interface FootnoteNode extends ElementBase<'footnote'> {
  id: string;
  text: string;
  referenceLabel: string;
  isReference: boolean;
}

// =============================================================================
// Unions
// =============================================================================

export type AnyMacroNode = MacroNode | ImageMacroNode | VideoMacroNode | IncludeMacroNode;

export type InlineElement =
  | TextNode
  | EmphasisNode
  | StrongNode
  | HighlightNode
  | SuperscriptNode
  | SubscriptNode
  | InlineCodeNode
  | LinkNode
  | ImageNode
  | AnchorNode
  | CrossReferenceNode
  | FootnoteNode;

export type BlockElement =
  | SectionNode
  | ParagraphNode
  | ListNode
  | ListItemNode
  | DescriptionListNode
  | DescriptionListItemNode
  | TableNode
  | TableHeaderNode
  | TableRowNode
  | TableCellNode
  | CodeBlockNode
  | ListingNode
  | LiteralNode
  | VerseNode
  | PassthroughNode
  | BlockQuoteNode
  | SidebarNode
  | ExampleNode
  | OpenNode
  | AdmonitionNode
  | TableOfContentsNode;

export type DocumentElement = DocumentNode | BlockElement | AnyMacroNode | InlineElement;

/**
 * Node type by discriminant, e.g. `ElementOf<'section'>` is `SectionNode`
 */
export type ElementOf<T extends ElementType> = Extract<DocumentElement, { elementType: T }>;
