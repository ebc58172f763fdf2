/**
 * Include directive processing
 *
 * @since 2025-12-10
 */

export { IncludeProcessor } from './IncludeProcessor.js';
export { filterLines, filterTags, indentLines, parseLevelOffset, splitLines } from './contentFilters.js';
export { baseDirectoryOf, fileNameOf, pathKey, toUnixPath } from './path-utils.js';
export type { ElementParser, IncludeOutcome, SourceReadResult } from './types.js';
