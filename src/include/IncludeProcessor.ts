/**
 * Include Processor
 *
 * Expands `include::path[...]` directives:
 * resolve path -> cycle and depth checks -> read -> lines -> tags -> indent
 * -> parse with an extended include stack -> level offset.
 *
 * @since 2025-12-10
 */

import fs from 'fs';
import path from 'path';
import { appendChild, createSection } from '../model/elements.js';
import type { DocumentElement, IncludeMacroNode } from '../model/types.js';
import { CircularIncludeError, IncludeDepthError, IncludeError } from '../parser/errors.js';
import { ParseContext } from '../parser/ParseContext.js';
import { ParseSession } from '../parser/ParseSession.js';
import { AsciiDocTokenizer } from '../tokenizer/AsciiDocTokenizer.js';
import { filterLines, filterTags, indentLines, parseLevelOffset } from './contentFilters.js';
import { baseDirectoryOf, fileNameOf, isFile, pathKey } from './path-utils.js';
import type { ElementParser, IncludeOutcome, SourceReadResult } from './types.js';

export class IncludeProcessor {
  constructor(private readonly parser: ElementParser) {}

  /**
   * Parsed elements of the included file; empty when an optional file is
   * missing or unreadable. Throws for required files that cannot be read,
   * for cycles and for too deep nesting.
   */
  processInclude(
    macro: IncludeMacroNode,
    basePath: string,
    includeStack: readonly string[],
    session: ParseSession = new ParseSession()
  ): DocumentElement[] {
    const outcome = this.resolve(macro, basePath, includeStack, session);
    switch (outcome.status) {
      case 'resolved':
        return outcome.elements;
      case 'skipped':
        return [];
      case 'failed':
        throw outcome.error;
    }
  }

  /**
   * Same as processInclude, with read failures returned as values
   */
  resolve(
    macro: IncludeMacroNode,
    basePath: string,
    includeStack: readonly string[],
    session: ParseSession = new ParseSession()
  ): IncludeOutcome {
    const resolvedPath = this.resolveIncludePath(macro.filePath, basePath);

    if (this.wouldCreateCircularReference(resolvedPath, includeStack)) {
      const chain = includeStack.map(fileNameOf).join(' -> ');
      const file = fileNameOf(resolvedPath);
      throw new CircularIncludeError(
        `Circular include detected: ${chain} -> ${file}. ` +
          `File '${file}' is already being processed in the include chain.`,
        resolvedPath,
        includeStack
      );
    }

    const maxDepth = session.options.maxIncludeDepth;
    if (includeStack.length >= maxDepth) {
      throw new IncludeDepthError(
        `Include depth limit of ${maxDepth} exceeded while including '${fileNameOf(resolvedPath)}'`,
        resolvedPath,
        includeStack
      );
    }

    const source = this.readSource(resolvedPath);
    if (!source.ok) {
      if (macro.optional) {
        return { status: 'skipped', path: resolvedPath, reason: source.message };
      }
      return {
        status: 'failed',
        path: resolvedPath,
        error: new IncludeError(source.message, resolvedPath, includeStack),
      };
    }

    let content = filterLines(source.content, macro.lines);
    content = filterTags(content, macro.tags);
    content = indentLines(content, macro.indent);

    const elements = this.parseContent(content, resolvedPath, [...includeStack, resolvedPath], session);
    return { status: 'resolved', path: resolvedPath, elements: this.applyLevelOffset(elements, macro.levelOffset) };
  }

  /**
   * Absolute paths are normalized as they are; relative ones are resolved
   * against `basePath` (its directory when it is a file, the working
   * directory when it is empty).
   */
  resolveIncludePath(filePath: string, basePath: string): string {
    if (!filePath) {
      throw new Error('Include file path cannot be empty');
    }
    if (path.isAbsolute(filePath)) {
      return path.resolve(filePath);
    }
    return path.resolve(baseDirectoryOf(basePath), filePath);
  }

  /**
   * True when `filePath` is already in the include chain (case-insensitive)
   */
  wouldCreateCircularReference(filePath: string, includeStack: readonly string[]): boolean {
    if (!filePath) return false;
    const key = pathKey(filePath);
    return includeStack.some((entry) => pathKey(entry) === key);
  }

  private readSource(resolvedPath: string): SourceReadResult {
    if (!isFile(resolvedPath)) {
      return { ok: false, reason: 'missing', message: `Include file not found: ${resolvedPath}` };
    }
    try {
      return { ok: true, content: fs.readFileSync(resolvedPath, 'utf8') };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        reason: 'unreadable',
        message: `Error reading include file '${resolvedPath}': ${detail}`,
      };
    }
  }

  /**
   * Parse included text with its own tokenizer and context
   */
  private parseContent(
    content: string,
    filePath: string,
    includeStack: readonly string[],
    session: ParseSession
  ): DocumentElement[] {
    const context = new ParseContext(new AsciiDocTokenizer(content), { filePath, includeStack, session });
    const elements: DocumentElement[] = [];

    while (!context.atEnd) {
      const element = this.parser.parseElementFromContext(context);
      if (element) {
        elements.push(element);
      } else {
        context.advance();
      }
    }

    return elements;
  }

  /**
   * Shift top-level sections by `leveloffset`, never below level 1.
   * Shifted sections are new nodes that take over the original's children.
   */
  private applyLevelOffset(elements: DocumentElement[], selector: string | undefined): DocumentElement[] {
    const offset = parseLevelOffset(selector);
    if (offset === undefined) return elements;

    return elements.map((element) => {
      if (element.elementType !== 'section') return element;

      const shifted = createSection(element.title, Math.max(1, element.level + offset), element.id);
      for (const [name, value] of element.attributes) {
        shifted.attributes.set(name, value);
      }
      for (const child of [...element.children]) {
        appendChild(shifted, child);
      }
      return shifted;
    });
  }
}
