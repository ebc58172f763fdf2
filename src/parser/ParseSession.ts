/**
 * State shared by one top-level parse and every include it expands
 *
 * @since 2025-12-09
 */

import type { DiagnosticKind, ParseDiagnostic } from '../model/types.js';
import { FootnoteRegistry } from './footnotes.js';
import { InlineParser } from './InlineParser.js';
import { resolveParserOptions, type ResolvedParserOptions } from './types.js';

export class ParseSession {
  readonly footnotes = new FootnoteRegistry();
  readonly inline = new InlineParser(this.footnotes);
  readonly diagnostics: ParseDiagnostic[] = [];

  /** Document attributes (`:name: value`), shared with included files */
  readonly attributes = new Map<string, string>();

  constructor(public readonly options: ResolvedParserOptions = resolveParserOptions()) {}

  report(kind: DiagnosticKind, message: string, position: { line: number; column: number }, file = ''): ParseDiagnostic {
    const diagnostic: ParseDiagnostic = { kind, message, line: position.line, column: position.column, file };
    this.diagnostics.push(diagnostic);
    return diagnostic;
  }

  /**
   * Console warning, unless the parse is silent
   */
  warn(message: string): void {
    if (!this.options.silent) {
      console.warn(`⚠️ ${message}`);
    }
  }
}
