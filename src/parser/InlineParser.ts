/**
 * Inline span parser
 *
 * Scans a line for the earliest inline construct. Every rule is tried from
 * the current position; the smallest match index wins and ties go to the
 * rule listed first (footnote must stay ahead of the generic inline macro).
 * Text between matches becomes plain text nodes.
 *
 * Strong, emphasis and highlight spans are parsed again for nested spans,
 * so `*_word_*` is a strong node holding an emphasis node.
 *
 * @since 2025-12-09
 */

import {
  createAnchor,
  createCrossReference,
  createEmphasis,
  createFootnote,
  createHighlight,
  createImage,
  createInlineCode,
  createLink,
  createStrong,
  createSubscript,
  createSuperscript,
  createText,
  appendChildren,
} from '../model/elements.js';
import { createMacroElement } from '../model/macros.js';
import type {
  AnyMacroNode,
  EmphasisNode,
  FootnoteNode,
  HighlightNode,
  InlineElement,
  StrongNode,
} from '../model/types.js';
import { parseMacroParameters } from './macroParameters.js';
import { FootnoteRegistry } from './footnotes.js';

export type InlineNode = InlineElement | AnyMacroNode;

type InlineKind =
  | 'strong'
  | 'emphasis'
  | 'highlight'
  | 'superscript'
  | 'subscript'
  | 'inline-code'
  | 'link'
  | 'image'
  | 'anchor'
  | 'cross-reference'
  | 'footnote'
  | 'inline-macro';

interface InlineRule {
  kind: InlineKind;
  pattern: RegExp;
}

/**
 * Inline rules in priority order. Patterns must carry the `g` flag
 * (searches start at `lastIndex`).
 */
export const INLINE_RULES: readonly InlineRule[] = [
  // Unconstrained (`**word**`) before constrained (`*word*`)
  { kind: 'strong', pattern: /\*\*([^*]+?)\*\*|\*([^*]+)\*/g },
  { kind: 'emphasis', pattern: /__([^_]+?)__|_([^_]+)_/g },
  { kind: 'highlight', pattern: /#([^#]+)#/g },
  { kind: 'superscript', pattern: /\^([^^]+)\^/g },
  { kind: 'subscript', pattern: /~([^~]+)~/g },
  { kind: 'inline-code', pattern: /`([^`]+)`/g },
  { kind: 'link', pattern: /(https?:\/\/[^\s[\]]+)(\[([^\]]*)\])?/g },
  { kind: 'image', pattern: /image::([^[]+)\[([^\]]*)\]/g },
  { kind: 'anchor', pattern: /\[\[([^\]]+)\]\]/g },
  { kind: 'cross-reference', pattern: /<<([^,>]+?)(?:,(.+?))?>>/g },
  { kind: 'footnote', pattern: /footnote:([^:[\]]*?)\[([^\]]*)\]/g },
  { kind: 'inline-macro', pattern: /(\w+):([^[\s]*)\[([^\]]*)\]/g },
];

interface InlineMatch {
  kind: InlineKind;
  match: RegExpExecArray;
}

export class InlineParser {
  constructor(private readonly footnotes: FootnoteRegistry = new FootnoteRegistry()) {}

  /**
   * Parse a line into inline nodes, in source order
   */
  parse(text: string): InlineNode[] {
    const nodes: InlineNode[] = [];
    let position = 0;

    while (position < text.length) {
      const next = this.findNextMatch(text, position);
      if (!next) {
        nodes.push(createText(text.slice(position)));
        break;
      }

      const { match } = next;
      if (match.index > position) {
        nodes.push(createText(text.slice(position, match.index)));
      }
      nodes.push(this.createNode(next));
      position = match.index + match[0].length;
    }

    return nodes;
  }

  /**
   * Plain-text rendering of a line (markup characters of matched spans removed)
   */
  toPlainText(nodes: readonly InlineNode[]): string {
    return nodes.map((node) => plainTextOf(node)).join('');
  }

  private findNextMatch(text: string, start: number): InlineMatch | null {
    let earliest: InlineMatch | null = null;

    for (const rule of INLINE_RULES) {
      rule.pattern.lastIndex = start;
      const match = rule.pattern.exec(text);
      if (match && match[0].length > 0 && (!earliest || match.index < earliest.match.index)) {
        earliest = { kind: rule.kind, match };
      }
    }

    return earliest;
  }

  private createNode({ kind, match }: InlineMatch): InlineNode {
    switch (kind) {
      case 'strong':
        return this.withNestedSpans(createStrong(match[1] ?? match[2]));
      case 'emphasis':
        return this.withNestedSpans(createEmphasis(match[1] ?? match[2]));
      case 'highlight':
        return this.withNestedSpans(createHighlight(match[1]));
      case 'superscript':
        return createSuperscript(match[1]);
      case 'subscript':
        return createSubscript(match[1]);
      case 'inline-code':
        return createInlineCode(match[1]);
      case 'link': {
        const url = match[1];
        return createLink(url, match[3] || url);
      }
      case 'image':
        return createImage(match[1], match[2]);
      case 'anchor': {
        const [id, label = ''] = match[1].split(',');
        return createAnchor(id.trim(), label.trim());
      }
      case 'cross-reference':
        return createCrossReference(match[1].trim(), (match[2] ?? '').trim());
      case 'footnote':
        return this.createFootnote(match[1].trim(), match[2].trim());
      case 'inline-macro':
        return createMacroElement(
          match[1].trim(),
          match[2].trim(),
          parseMacroParameters(match[3].trim()),
          'inline'
        );
    }
  }

  /**
   * `footnote:[text]` anonymous, `footnote:id[text]` named, `footnote:id[]` reference
   */
  private createFootnote(id: string, text: string): FootnoteNode {
    if (!id) {
      const anonymous = this.footnotes.nextAnonymous();
      return createFootnote(anonymous.id, text, anonymous.label, false);
    }
    if (!text) {
      return createFootnote(id, '', this.footnotes.reference(id), true);
    }
    return createFootnote(id, text, this.footnotes.define(id), false);
  }

  private withNestedSpans<T extends StrongNode | EmphasisNode | HighlightNode>(node: T): T {
    const inner = this.parse(node.text);
    if (inner.length === 1 && inner[0].elementType === 'text') {
      return node;
    }
    return appendChildren(node, inner);
  }
}

function plainTextOf(node: InlineNode): string {
  switch (node.elementType) {
    case 'text':
    case 'superscript':
    case 'subscript':
    case 'link':
    case 'footnote':
      return node.text;
    case 'strong':
    case 'emphasis':
    case 'highlight':
      return node.children.length > 0
        ? node.children.map((child) => (isInlineNode(child) ? plainTextOf(child) : '')).join('')
        : node.text;
    case 'inline-code':
      return node.code;
    case 'image':
      return node.alt;
    case 'anchor':
      return '';
    case 'cross-reference':
      return node.linkText || node.targetId;
    case 'macro':
    case 'image-macro':
    case 'video-macro':
    case 'include-macro':
      return node.target;
  }
}

function isInlineNode(node: { elementType: string }): node is InlineNode {
  return INLINE_ELEMENT_TYPES.has(node.elementType);
}

const INLINE_ELEMENT_TYPES: ReadonlySet<string> = new Set<InlineNode['elementType']>([
  'text',
  'emphasis',
  'strong',
  'highlight',
  'superscript',
  'subscript',
  'inline-code',
  'link',
  'image',
  'anchor',
  'cross-reference',
  'footnote',
  'macro',
  'image-macro',
  'video-macro',
  'include-macro',
]);
