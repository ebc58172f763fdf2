/**
 * DocumentTree - queries over a parsed document
 *
 * @since 2025-12-08
 */

import type {
  DocumentElement,
  DocumentNode,
  ElementOf,
  ElementType,
  SectionNode,
  TableOfContentsEntry,
} from './types.js';

/**
 * DocumentTree class for querying the element tree
 */
export class DocumentTree {
  constructor(public readonly root: DocumentElement) {}

  /**
   * Find all elements of one kind, in document order
   */
  findElements<T extends ElementType>(elementType: T): ElementOf<T>[] {
    const results: ElementOf<T>[] = [];
    this.walk((node) => {
      if (isElementOf(node, elementType)) {
        results.push(node);
      }
    });
    return results;
  }

  /**
   * Find the first element of one kind
   */
  findFirst<T extends ElementType>(elementType: T): ElementOf<T> | null {
    let result: ElementOf<T> | null = null;
    this.walk((node) => {
      if (isElementOf(node, elementType)) {
        result = node;
        return false; // Stop traversal
      }
    });
    return result;
  }

  /**
   * Find a section or anchor by its id
   */
  getElementById(id: string): DocumentElement | null {
    let result: DocumentElement | null = null;
    this.walk((node) => {
      if ((node.elementType === 'section' || node.elementType === 'anchor') && node.id === id) {
        result = node;
        return false;
      }
    });
    return result;
  }

  /**
   * Titled sections, including the ones nested in containers
   */
  getSections(maxLevel = Number.POSITIVE_INFINITY): SectionNode[] {
    return this.findElements('section').filter((s) => s.title !== '' && s.level <= maxLevel);
  }

  /**
   * Build nested table-of-contents entries from the titled sections
   */
  buildOutline(maxLevel: number): TableOfContentsEntry[] {
    const entries: TableOfContentsEntry[] = [];
    const stack: TableOfContentsEntry[] = [];

    for (const section of this.getSections(maxLevel)) {
      const entry: TableOfContentsEntry = {
        title: section.title,
        level: section.level,
        anchorId: section.id,
        children: [],
      };

      while (stack.length > 0 && stack[stack.length - 1].level >= section.level) {
        stack.pop();
      }

      const parent = stack[stack.length - 1];
      if (parent) {
        parent.children.push(entry);
      } else {
        entries.push(entry);
      }
      stack.push(entry);
    }

    return entries;
  }

  /**
   * Get all plain text from a subtree
   */
  getTextContent(node: DocumentElement = this.root): string {
    const texts: string[] = [];
    this.walk((n) => {
      const text = plainTextOf(n);
      if (text) texts.push(text);
    }, node);
    return texts.join(' ').replace(/\s+/g, ' ').trim();
  }

  /**
   * Depth-first, pre-order walk
   * @param callback Called for each node. Return false to stop traversal.
   */
  walk(callback: (node: DocumentElement) => boolean | void, node: DocumentElement = this.root): boolean {
    const result = callback(node);
    if (result === false) return false;

    for (const child of node.children) {
      const shouldContinue = this.walk(callback, child);
      if (!shouldContinue) return false;
    }

    return true;
  }
}

/**
 * Convenience: wrap a document in a DocumentTree
 */
export function queryDocument(document: DocumentNode): DocumentTree {
  return new DocumentTree(document);
}

function isElementOf<T extends ElementType>(node: DocumentElement, elementType: T): node is ElementOf<T> {
  return node.elementType === elementType;
}

/**
 * Own text of a node (not its children)
 */
function plainTextOf(node: DocumentElement): string {
  switch (node.elementType) {
    case 'text':
    case 'superscript':
    case 'subscript':
      return node.text;
    case 'emphasis':
    case 'strong':
    case 'highlight':
      // Nested spans carry the same text as children
      return node.children.length > 0 ? '' : node.text;
    case 'inline-code':
      return node.code;
    case 'link':
      return node.text;
    case 'list-item':
      return node.text;
    case 'description-list-item':
      return `${node.term} ${node.description}`;
    case 'table-cell':
      return node.content;
    case 'code-block':
    case 'listing':
    case 'literal':
    case 'verse':
    case 'passthrough':
    case 'blockquote':
    case 'admonition':
      return node.content;
    case 'section':
      return node.title;
    case 'footnote':
      return node.text;
    default:
      return '';
  }
}
