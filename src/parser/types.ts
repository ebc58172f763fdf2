/**
 * Types for the AsciiDoc parser
 *
 * @since 2025-12-08
 */

/**
 * Parse options
 */
export interface ParserOptions {
  /**
   * File or directory relative includes are resolved against.
   * Defaults to the current working directory.
   */
  basePath?: string;

  /** Rethrow include failures instead of keeping the include macro node (default: false) */
  strictIncludes?: boolean;

  /** Maximum include nesting depth (default: 64) */
  maxIncludeDepth?: number;

  /** Fill `toc::[]` entries from the document sections (default: true) */
  generateToc?: boolean;

  /** Suppress console warnings (default: false) */
  silent?: boolean;
}

export type ResolvedParserOptions = Required<ParserOptions>;

export const DEFAULT_MAX_INCLUDE_DEPTH = 64;

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  return {
    basePath: options.basePath ?? '',
    strictIncludes: options.strictIncludes ?? false,
    maxIncludeDepth: options.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH,
    generateToc: options.generateToc ?? true,
    silent: options.silent ?? false,
  };
}
