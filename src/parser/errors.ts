/**
 * Parse errors
 *
 * Every error raised while parsing carries the line and column it refers to
 * (0, 0 when it is not tied to a source position, e.g. include failures).
 *
 * @since 2025-12-08
 */

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line = 0,
    public readonly column = 0
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * An include directive could not be resolved
 */
export class IncludeError extends ParseError {
  constructor(
    message: string,
    /** Resolved path of the file that failed */
    public readonly filePath: string,
    /** Files being expanded when the failure happened, outermost first */
    public readonly includeChain: readonly string[]
  ) {
    super(message, 0, 0);
    this.name = 'IncludeError';
  }
}

/**
 * An include would re-enter a file that is already being expanded
 */
export class CircularIncludeError extends IncludeError {
  constructor(message: string, filePath: string, includeChain: readonly string[]) {
    super(message, filePath, includeChain);
    this.name = 'CircularIncludeError';
  }
}

/**
 * Include nesting went past the configured maximum
 */
export class IncludeDepthError extends IncludeError {
  constructor(message: string, filePath: string, includeChain: readonly string[]) {
    super(message, filePath, includeChain);
    this.name = 'IncludeDepthError';
  }
}
