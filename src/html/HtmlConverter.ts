/**
 * HTML Converter
 *
 * Renders a parsed document to HTML. Block renderers return one or more
 * lines; inline renderers return fragments that paragraphs concatenate.
 *
 * @since 2025-12-11
 */

import type {
  AdmonitionNode,
  AnyMacroNode,
  BlockQuoteNode,
  DocumentElement,
  DocumentNode,
  FootnoteNode,
  ImageMacroNode,
  ListNode,
  SectionNode,
  TableCellNode,
  TableNode,
  TableOfContentsEntry,
  TableOfContentsNode,
  VerseNode,
  VideoMacroNode,
} from '../model/types.js';
import { DocumentTree } from '../model/DocumentTree.js';
import { escapeHtml } from './escape.js';
import type { HtmlConverterOptions } from './types.js';

const FOOTNOTE_ID_PREFIX = '_footnotedef_';

export class HtmlConverter {
  private readonly options: Required<HtmlConverterOptions>;

  constructor(options: HtmlConverterOptions = {}) {
    this.options = {
      standalone: options.standalone ?? false,
      title: options.title ?? '',
      footnotes: options.footnotes ?? true,
    };
  }

  /**
   * Render a whole document
   */
  convert(document: DocumentNode): string {
    const body: string[] = [];

    const header = this.renderHeader(document);
    if (header) body.push(header);

    for (const element of document.elements) {
      const html = this.convertElement(element);
      if (html) body.push(html);
    }

    if (this.options.footnotes) {
      const footnotes = this.renderFootnoteDefinitions(document);
      if (footnotes) body.push(footnotes);
    }

    const content = body.join('\n');
    if (!this.options.standalone) return content;

    const title = this.options.title || document.header.title;
    return [
      '<!DOCTYPE html>',
      '<html>',
      '<head>',
      '<meta charset="utf-8">',
      `<title>${escapeHtml(title)}</title>`,
      '</head>',
      '<body>',
      content,
      '</body>',
      '</html>',
    ].join('\n');
  }

  /**
   * Render one element (block or inline)
   */
  convertElement(element: DocumentElement): string {
    switch (element.elementType) {
      case 'document':
        return this.convert(element);
      case 'section':
        return this.renderSection(element);
      case 'paragraph':
        return `<p>${this.renderInlineChildren(element)}</p>`;
      case 'list':
        return this.renderList(element);
      case 'list-item': {
        const checkbox = element.isCheckbox
          ? `<input type="checkbox" disabled${element.isChecked ? ' checked' : ''}> `
          : '';
        return `<li>${checkbox}${escapeHtml(element.text)}</li>`;
      }
      case 'description-list':
        return ['<dl>', ...element.children.map((child) => this.convertElement(child)), '</dl>'].join('\n');
      case 'description-list-item':
        return `<dt>${escapeHtml(element.term)}</dt>\n<dd>${escapeHtml(element.description)}</dd>`;
      case 'table':
        return this.renderTable(element);
      case 'table-header':
        return element.children.map((child) => this.convertElement(child)).join('\n');
      case 'table-row':
        return `<tr>${element.children.map((child) => this.convertElement(child)).join('')}</tr>`;
      case 'table-cell':
        return this.renderCell(element);
      case 'code-block': {
        const languageClass = element.language ? ` class="language-${escapeHtml(element.language)}"` : '';
        return `<pre><code${languageClass}>${escapeHtml(element.content)}</code></pre>`;
      }
      case 'listing':
        return this.renderPreBlock('listingblock', element.title, element.content);
      case 'literal':
        return this.renderPreBlock('literalblock', element.title, element.content);
      case 'verse':
        return this.renderVerse(element);
      case 'passthrough':
        return element.content;
      case 'blockquote':
        return this.renderBlockQuote(element);
      case 'sidebar':
        return this.renderContainer('sidebarblock', element.title, element.children);
      case 'example':
        return this.renderContainer('exampleblock', element.title, element.children);
      case 'open': {
        const role = element.masqueradeType ? ` ${escapeHtml(element.masqueradeType)}` : '';
        return this.renderContainer(`openblock${role}`, element.title, element.children);
      }
      case 'admonition':
        return this.renderAdmonition(element);
      case 'toc':
        return this.renderTableOfContents(element);
      case 'macro':
      case 'image-macro':
      case 'video-macro':
      case 'include-macro':
        return this.renderMacro(element);
      case 'text':
        return escapeHtml(element.text);
      case 'emphasis':
        return `<em>${this.renderSpan(element)}</em>`;
      case 'strong':
        return `<strong>${this.renderSpan(element)}</strong>`;
      case 'highlight':
        return `<mark>${this.renderSpan(element)}</mark>`;
      case 'superscript':
        return `<sup>${escapeHtml(element.text)}</sup>`;
      case 'subscript':
        return `<sub>${escapeHtml(element.text)}</sub>`;
      case 'inline-code':
        return `<code>${escapeHtml(element.code)}</code>`;
      case 'link': {
        const title = element.title ? ` title="${escapeHtml(element.title)}"` : '';
        return `<a href="${escapeHtml(element.url)}"${title}>${escapeHtml(element.text)}</a>`;
      }
      case 'image': {
        const title = element.title ? ` title="${escapeHtml(element.title)}"` : '';
        return `<img src="${escapeHtml(element.src)}" alt="${escapeHtml(element.alt)}"${title}/>`;
      }
      case 'anchor':
        return element.label
          ? `<a id="${escapeHtml(element.id)}">${escapeHtml(element.label)}</a>`
          : `<a id="${escapeHtml(element.id)}"></a>`;
      case 'cross-reference':
        return `<a href="#${escapeHtml(element.targetId)}" class="xref">${escapeHtml(
          element.linkText || `[${element.targetId}]`
        )}</a>`;
      case 'footnote':
        return this.renderFootnoteReference(element);
      default: {
        const unhandled: never = element;
        return this.renderUnknown(unhandled);
      }
    }
  }

  private renderHeader(document: DocumentNode): string {
    const { header } = document;
    if (!header.title) return '';

    const lines = [`<h1>${escapeHtml(header.title)}</h1>`];
    if (header.author) {
      lines.push(`<div class="author">${escapeHtml(header.author)}</div>`);
    }
    if (header.revision) {
      lines.push(`<div class="revision">${escapeHtml(header.revision)}</div>`);
    }
    return lines.join('\n');
  }

  private renderSection(section: SectionNode): string {
    const children = section.children.map((child) => this.convertElement(child));
    if (section.level === 0 || !section.title) {
      // Untitled container (several elements from one include)
      return children.join('\n');
    }

    const level = Math.min(section.level, 6);
    const id = section.id ? ` id="${escapeHtml(section.id)}"` : '';
    return [`<h${level}${id}>${escapeHtml(section.title)}</h${level}>`, ...children].join('\n');
  }

  private renderList(list: ListNode): string {
    const tag = list.listType === 'ordered' ? 'ol' : 'ul';
    const start = list.listType === 'ordered' && list.startNumber !== 1 ? ` start="${list.startNumber}"` : '';
    return [`<${tag}${start}>`, ...list.children.map((child) => this.convertElement(child)), `</${tag}>`].join('\n');
  }

  private renderTable(table: TableNode): string {
    const lines = ['<table class="tableblock frame-all grid-all">'];
    if (table.header) {
      lines.push('<thead>', ...table.header.children.map((row) => this.convertElement(row)), '</thead>');
    }
    if (table.children.length > 0) {
      lines.push('<tbody>', ...table.children.map((row) => this.convertElement(row)), '</tbody>');
    }
    lines.push('</table>');
    return lines.join('\n');
  }

  private renderCell(cell: TableCellNode): string {
    const tag = cell.isHeader ? 'th' : 'td';
    let attributes = '';
    if (cell.colSpan > 1) attributes += ` colspan="${cell.colSpan}"`;
    if (cell.rowSpan > 1) attributes += ` rowspan="${cell.rowSpan}"`;
    if (cell.alignment !== 'left') attributes += ` class="halign-${cell.alignment}"`;
    return `<${tag}${attributes}>${escapeHtml(cell.content)}</${tag}>`;
  }

  private renderPreBlock(className: string, title: string | undefined, content: string): string {
    const lines = [`<div class="${className}">`];
    if (title) lines.push(`<div class="title">${escapeHtml(title)}</div>`);
    lines.push(`<pre>${escapeHtml(content)}</pre>`, '</div>');
    return lines.join('\n');
  }

  private renderVerse(verse: VerseNode): string {
    const lines = ['<div class="verseblock">'];
    if (verse.title) lines.push(`<div class="title">${escapeHtml(verse.title)}</div>`);
    lines.push(`<pre class="content">${escapeHtml(verse.content)}</pre>`);
    if (verse.author || verse.citation) {
      const citation = verse.citation ? `<br><cite>${escapeHtml(verse.citation)}</cite>` : '';
      lines.push(`<div class="attribution">&#8212; ${escapeHtml(verse.author ?? '')}${citation}</div>`);
    }
    lines.push('</div>');
    return lines.join('\n');
  }

  private renderBlockQuote(quote: BlockQuoteNode): string {
    const lines = ['<blockquote>'];
    for (const paragraph of quote.content.split(/\n\s*\n/)) {
      if (paragraph.trim()) lines.push(`<p>${escapeHtml(paragraph.trim())}</p>`);
    }
    if (quote.attribution) {
      const cite = quote.cite ? `, <em>${escapeHtml(quote.cite)}</em>` : '';
      lines.push(`<cite>${escapeHtml(quote.attribution)}${cite}</cite>`);
    }
    lines.push('</blockquote>');
    return lines.join('\n');
  }

  private renderContainer(className: string, title: string | undefined, children: DocumentElement[]): string {
    const lines = [`<div class="${className}">`];
    if (title) lines.push(`<div class="title">${escapeHtml(title)}</div>`);
    lines.push('<div class="content">', ...children.map((child) => this.convertElement(child)), '</div>', '</div>');
    return lines.join('\n');
  }

  private renderAdmonition(admonition: AdmonitionNode): string {
    const type = admonition.admonitionType;
    const label = type.charAt(0).toUpperCase() + type.slice(1);
    const lines = [
      `<div class="admonitionblock ${type}">`,
      '<table>',
      '<tr>',
      `<td class="icon"><div class="title">${label}</div></td>`,
      '<td class="content">',
    ];
    if (admonition.title) lines.push(`<div class="title">${escapeHtml(admonition.title)}</div>`);
    lines.push(
      `<div class="paragraph"><p>${escapeHtml(admonition.content)}</p></div>`,
      '</td>',
      '</tr>',
      '</table>',
      '</div>'
    );
    return lines.join('\n');
  }

  private renderTableOfContents(toc: TableOfContentsNode): string {
    const lines = ['<div class="toc">', `<div class="toc-title">${escapeHtml(toc.title)}</div>`];
    if (toc.entries.length > 0) {
      lines.push(this.renderTocEntries(toc.entries));
    }
    lines.push('</div>');
    return lines.join('\n');
  }

  private renderTocEntries(entries: TableOfContentsEntry[]): string {
    const items = entries.map((entry) => {
      const link = `<a href="#${escapeHtml(entry.anchorId)}">${escapeHtml(entry.title)}</a>`;
      return entry.children.length > 0 ? `<li>${link}\n${this.renderTocEntries(entry.children)}</li>` : `<li>${link}</li>`;
    });
    return ['<ul>', ...items, '</ul>'].join('\n');
  }

  private renderMacro(macro: AnyMacroNode): string {
    switch (macro.elementType) {
      case 'image-macro':
        return this.renderImageMacro(macro);
      case 'video-macro':
        return this.renderVideoMacro(macro);
      case 'include-macro': {
        const lines = macro.lines ? ` (lines: ${escapeComment(macro.lines)})` : '';
        const tags = macro.tags ? ` (tags: ${escapeComment(macro.tags)})` : '';
        return `<!-- Include: ${escapeComment(macro.filePath)}${lines}${tags} -->`;
      }
      case 'macro': {
        const data = [...macro.parameters]
          .map(([name, value]) => ` data-${escapeHtml(name)}="${escapeHtml(value)}"`)
          .join('');
        const tag = macro.macroType === 'block' ? 'div' : 'span';
        return `<${tag} class="macro macro-${escapeHtml(macro.name)}" data-target="${escapeHtml(
          macro.target
        )}"${data}></${tag}>`;
      }
    }
  }

  private renderImageMacro(image: ImageMacroNode): string {
    let img = `<img src="${escapeHtml(image.source)}" alt="${escapeHtml(image.alt)}"`;
    if (image.title) img += ` title="${escapeHtml(image.title)}"`;
    if (image.width !== undefined) img += ` width="${image.width}"`;
    if (image.height !== undefined) img += ` height="${image.height}"`;
    if (image.align) img += ` class="align-${escapeHtml(image.align)}"`;
    img += '/>';

    if (image.link) {
      img = `<a href="${escapeHtml(image.link)}">${img}</a>`;
    }
    return image.macroType === 'block' ? `<div class="imageblock">${img}</div>` : img;
  }

  private renderVideoMacro(video: VideoMacroNode): string {
    let html = '<video';
    if (video.width !== undefined) html += ` width="${video.width}"`;
    if (video.height !== undefined) html += ` height="${video.height}"`;
    if (video.controls) html += ' controls';
    if (video.autoplay) html += ' autoplay';
    if (video.loop) html += ' loop';
    if (video.muted) html += ' muted';
    if (video.poster) html += ` poster="${escapeHtml(video.poster)}"`;
    html += '>';
    html += `<source src="${escapeHtml(video.source)}" type="video/${escapeHtml(video.videoFormat)}">`;
    html += 'Your browser does not support the video tag.';
    html += '</video>';

    if (video.title) {
      html += `\n<div class="video-title">${escapeHtml(video.title)}</div>`;
    }
    return html;
  }

  private renderFootnoteReference(footnote: FootnoteNode): string {
    return `<a href="#${footnoteAnchor(footnote.id)}" class="footnote"><sup>${escapeHtml(
      footnote.referenceLabel
    )}</sup></a>`;
  }

  /**
   * Footnote texts at the end of the document, one per footnote id
   */
  private renderFootnoteDefinitions(document: DocumentNode): string {
    const definitions = new Map<string, FootnoteNode>();
    for (const footnote of new DocumentTree(document).findElements('footnote')) {
      if (!footnote.isReference && !definitions.has(footnote.id)) {
        definitions.set(footnote.id, footnote);
      }
    }
    if (definitions.size === 0) return '';

    const lines = ['<div id="footnotes">', '<hr>'];
    for (const footnote of definitions.values()) {
      lines.push(
        `<div class="footnote" id="${footnoteAnchor(footnote.id)}">${escapeHtml(footnote.referenceLabel)}. ${escapeHtml(
          footnote.text
        )}</div>`
      );
    }
    lines.push('</div>');
    return lines.join('\n');
  }

  private renderInlineChildren(element: DocumentElement): string {
    return element.children.map((child) => this.convertElement(child)).join('');
  }

  /**
   * Strong/emphasis/highlight: nested spans when present, else the text
   */
  private renderSpan(element: { text: string; children: DocumentElement[] }): string {
    return element.children.length > 0
      ? element.children.map((child) => this.convertElement(child)).join('')
      : escapeHtml(element.text);
  }

  /**
   * Fallback for nodes without a dedicated renderer
   */
  private renderUnknown(element: { elementType: string; children: DocumentElement[] }): string {
    const children = element.children.map((child) => this.convertElement(child)).join('\n');
    return `<div class="${escapeHtml(element.elementType)}">${children}</div>`;
  }
}

function footnoteAnchor(id: string): string {
  return escapeHtml(id.startsWith(FOOTNOTE_ID_PREFIX) ? id : `${FOOTNOTE_ID_PREFIX}${id}`);
}

function escapeComment(text: string): string {
  return escapeHtml(text).replace(/--/g, '&#45;&#45;');
}
