/**
 * adoc-tree
 *
 * AsciiDoc parser producing a typed document tree
 *
 * ## Recommended API (use these):
 * - AsciiDocParser - Parse strings or files into a DocumentNode
 * - DocumentTree - Query a parsed tree (by type, by id, outline)
 * - HtmlConverter - Render a tree to HTML
 *
 * ## Lower-level pieces:
 * - AsciiDocTokenizer - Line classifier feeding the parser
 * - InlineParser - Inline markup within a line of text
 * - IncludeProcessor - `include::` resolution and content filters
 */

// =============================================================================
// PUBLIC API - Recommended for external use
// =============================================================================

export * from './model/index.js';
export * from './parser/index.js';
export * from './html/index.js';

// =============================================================================
// INTERNAL API - Building blocks, exported for tooling
// =============================================================================

export * from './tokenizer/index.js';
export * from './include/index.js';
