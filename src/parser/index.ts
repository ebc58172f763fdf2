/**
 * AsciiDoc parser
 *
 * @since 2025-12-08
 */

export { AsciiDocParser } from './AsciiDocParser.js';
export { InlineParser, INLINE_RULES } from './InlineParser.js';
export type { InlineNode } from './InlineParser.js';
export { ParseContext } from './ParseContext.js';
export type { ParseContextOptions } from './ParseContext.js';
export { ParseSession } from './ParseSession.js';
export { FootnoteRegistry } from './footnotes.js';
export { parseMacroParameters, splitMacroParameters } from './macroParameters.js';
export { ParseError, IncludeError, CircularIncludeError, IncludeDepthError } from './errors.js';
export { resolveParserOptions, DEFAULT_MAX_INCLUDE_DEPTH } from './types.js';
export type { ParserOptions, ResolvedParserOptions } from './types.js';
