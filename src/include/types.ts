/**
 * Types for include processing
 *
 * @since 2025-12-10
 */

import type { DocumentElement } from '../model/types.js';
import type { IncludeError } from '../parser/errors.js';
import type { ParseContext } from '../parser/ParseContext.js';

/**
 * What the include processor needs from a parser: the per-token dispatcher
 */
export interface ElementParser {
  parseElementFromContext(context: ParseContext): DocumentElement | null;
}

/**
 * Result of resolving one include directive
 *
 * Cycles and depth overflows are never represented here; they are thrown.
 */
export type IncludeOutcome =
  | { status: 'resolved'; path: string; elements: DocumentElement[] }
  /** Optional include whose file is missing or unreadable */
  | { status: 'skipped'; path: string; reason: string }
  /** Required include whose file is missing or unreadable */
  | { status: 'failed'; path: string; error: IncludeError };

export type SourceReadResult =
  | { ok: true; content: string }
  | { ok: false; reason: 'missing' | 'unreadable'; message: string };
