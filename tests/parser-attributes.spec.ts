/**
 * Tests for document header, attribute lines and block attributes
 */
import { describe, it, expect } from 'vitest';
import { AsciiDocParser } from '../src/parser/AsciiDocParser.js';
import { ParseContext } from '../src/parser/ParseContext.js';
import { ParseError } from '../src/parser/errors.js';
import { AsciiDocTokenizer } from '../src/tokenizer/AsciiDocTokenizer.js';
import { TokenType } from '../src/tokenizer/types.js';
import { expectElement } from './helpers.js';

const parser = new AsciiDocParser({ silent: true });

describe('Document header', () => {
  it('should read the title, author and revision lines', () => {
    const doc = parser.parse('= User Guide\nJane Doe <jane@example.com>\nv2.1, 2025-03-01: Draft\n\nBody text');

    expect(doc.header.title).toBe('User Guide');
    expect(doc.header.author).toBe('Jane Doe');
    expect(doc.header.email).toBe('jane@example.com');
    expect(doc.header.revision).toBe('2.1');
    expect(doc.header.date).toBe('2025-03-01');
    expect(doc.attributes.get('revremark')).toBe('Draft');
    expect(doc.elements).toHaveLength(1);
  });

  it('should leave a non-revision line after the author for the body', () => {
    const doc = parser.parse('= Notes\nSam Lee\nSpring edition');
    expect(doc.header.author).toBe('Sam Lee');
    expect(doc.header.revision).toBeUndefined();
    expect(doc.header.date).toBeUndefined();
    expect(expectElement(doc.elements[0], 'paragraph').text).toBe('Spring edition');
  });

  it('should parse a body line directly under the title as content', () => {
    const doc = parser.parse('= Title\nCompare a<b here.\nSecond line');
    expect(doc.header.author).toBeUndefined();
    expect(doc.attributes.has('revdate')).toBe(false);
    expect(doc.elements).toHaveLength(1);
    expect(expectElement(doc.elements[0], 'paragraph').text).toBe('Compare a<b here.\nSecond line');
  });

  it('should not read a header from a level-2 title', () => {
    const doc = parser.parse('== Chapter');
    expect(doc.header.title).toBe('');
    expect(expectElement(doc.elements[0], 'section').title).toBe('Chapter');
  });

  it('should share one attribute map between the header and the document', () => {
    const doc = parser.parse('= Title\n\n:author: From Attribute');
    expect(doc.header.attributes).toBe(doc.attributes);
    expect(doc.header.author).toBe('From Attribute');
  });
});

describe('Attribute lines', () => {
  it('should set, flag and unset document attributes', () => {
    const doc = parser.parse(':version: 1.2.0\n:experimental:\n:sectnums!:\n\nText');
    expect(doc.attributes.get('version')).toBe('1.2.0');
    expect(doc.attributes.get('experimental')).toBe('true');
    expect(doc.attributes.get('sectnums')).toBe('false');
    expect(doc.elements).toHaveLength(1);
  });

  it('should let a later line override an earlier one', () => {
    const doc = parser.parse(':mode: draft\n:mode: final');
    expect(doc.attributes.get('mode')).toBe('final');
  });
});

describe('Block attributes', () => {
  it('should give source blocks their language', () => {
    const doc = parser.parse('[source,typescript]\n----\nlet n = 1;\n----');
    const code = expectElement(doc.elements[0], 'code-block');
    expect(code.language).toBe('typescript');
    expect(code.content).toBe('let n = 1;');
    expect(code.attributes.get('style')).toBe('source');
  });

  it('should take the header row from the header option', () => {
    for (const line of ['[%header]', '[options="header"]', '[cols="1,1",options="header"]']) {
      const doc = parser.parse(`${line}\n|===\n| Name | Age\n| Ada | 36\n|===`);
      const table = expectElement(doc.elements[0], 'table');
      expect(table.header).not.toBeNull();
      expect(table.header?.parent).toBe(table);
      expect(table.children).toHaveLength(1);

      const headerRow = expectElement(table.header?.children[0], 'table-row');
      expect(headerRow.isHeader).toBe(true);
      expect(headerRow.children.map((cell) => expectElement(cell, 'table-cell').isHeader)).toEqual([true, true]);
    }
  });

  it('should keep named attributes on the element', () => {
    const doc = parser.parse('[cols="1,2",options="header"]\n|===\n| a | b\n|===');
    const table = expectElement(doc.elements[0], 'table');
    expect(table.attributes.get('cols')).toBe('1,2');
    expect(table.attributes.get('options')).toBe('header');
  });

  it('should read attribution and citation for quotes', () => {
    const doc = parser.parse('[quote, Grace Hopper, Interview]\n____\nShips are safe in harbor.\n____');
    const quote = expectElement(doc.elements[0], 'blockquote');
    expect(quote.content).toBe('Ships are safe in harbor.');
    expect(quote.attribution).toBe('Grace Hopper');
    expect(quote.cite).toBe('Interview');
  });

  it('should parse verse blocks and keep their line breaks', () => {
    const doc = parser.parse('[verse, A. Poet, Collected Lines]\n____\nRoses are red\n\nViolets are blue\n____');
    const verse = expectElement(doc.elements[0], 'verse');
    expect(verse.author).toBe('A. Poet');
    expect(verse.citation).toBe('Collected Lines');
    expect(verse.content).toBe('Roses are red\n\nViolets are blue');
  });

  it('should parse a verse paragraph', () => {
    const doc = parser.parse('[verse]\nOne line\nanother line');
    expect(expectElement(doc.elements[0], 'verse').content).toBe('One line\nanother line');
  });

  it('should parse styled literal, listing and pass paragraphs', () => {
    const doc = parser.parse('[literal]\nkeep *as is*\n\n[listing]\nls -la\n\n[pass]\n<u>raw</u>');
    expect(expectElement(doc.elements[0], 'literal').content).toBe('keep *as is*');
    expect(expectElement(doc.elements[1], 'listing').content).toBe('ls -la');
    expect(expectElement(doc.elements[2], 'passthrough').content).toBe('<u>raw</u>');
  });

  it('should parse a listing block and pass substitutions', () => {
    const doc = parser.parse('[listing]\n----\n$ make\n----\n\n[pass,subs=quotes]\n++++\n*x*\n++++');
    expect(expectElement(doc.elements[0], 'listing').content).toBe('$ make');
    expect(expectElement(doc.elements[1], 'passthrough').substitutions).toBe('quotes');
  });

  it('should build admonitions from styled paragraphs and example blocks', () => {
    const doc = parser.parse('[NOTE]\nShort note.\n\n[CAUTION]\n====\nLong caution.\n====');
    const note = expectElement(doc.elements[0], 'admonition');
    expect(note.admonitionType).toBe('note');
    expect(note.content).toBe('Short note.');

    const caution = expectElement(doc.elements[1], 'admonition');
    expect(caution.admonitionType).toBe('caution');
    expect(caution.content).toBe('Long caution.');
  });

  it('should record the role of a styled open block', () => {
    const doc = parser.parse('[abstract]\n--\nSummary here.\n--');
    const open = expectElement(doc.elements[0], 'open');
    expect(open.masqueradeType).toBe('abstract');
    expect(open.children).toHaveLength(1);
  });

  it('should attach unknown styles to the following paragraph', () => {
    const doc = parser.parse('[.lead]\nIntro paragraph.');
    const paragraph = expectElement(doc.elements[0], 'paragraph');
    expect(paragraph.text).toBe('Intro paragraph.');
    expect(paragraph.attributes.get('style')).toBe('.lead');
  });

  it('should keep a dangling attribute block as text', () => {
    const doc = parser.parse('[.orphan]');
    expect(expectElement(doc.elements[0], 'paragraph').text).toBe('.orphan');
  });
});

describe('ParseContext', () => {
  it('should report the expected and found token types', () => {
    const context = new ParseContext(new AsciiDocTokenizer('plain'));
    expect(() => context.expect(TokenType.Header)).toThrow(
      new ParseError('Expected Header but found Text at line 1, column 6')
    );
  });

  it('should stay on EndOfFile when advancing past the end', () => {
    const context = new ParseContext(new AsciiDocTokenizer('x'));
    expect(context.expect(TokenType.Text).value).toBe('x');
    expect(context.atEnd).toBe(true);
    expect(context.advance().type).toBe(TokenType.EndOfFile);
  });

  it('should track an element stack', () => {
    const context = new ParseContext(new AsciiDocTokenizer('x'));
    const doc = parser.parse('x');
    expect(context.peekElement()).toBeNull();
    context.pushElement(doc);
    expect(context.peekElement()).toBe(doc);
    expect(context.popElement()).toBe(doc);
    expect(context.popElement()).toBeNull();
  });
});
