/**
 * Tests for InlineParser
 */
import { describe, it, expect } from 'vitest';
import { InlineParser } from '../src/parser/InlineParser.js';
import { expectElement } from './helpers.js';

describe('InlineParser', () => {
  const parse = (text: string) => new InlineParser().parse(text);

  it('should return a single text node for plain text', () => {
    const nodes = parse('Nothing special here');
    expect(nodes).toHaveLength(1);
    expect(expectElement(nodes[0], 'text').text).toBe('Nothing special here');
  });

  it('should parse constrained strong and emphasis', () => {
    const nodes = parse('This is *bold* and _italic_.');
    expect(nodes.map((node) => node.elementType)).toEqual(['text', 'strong', 'text', 'emphasis', 'text']);
    expect(expectElement(nodes[1], 'strong').text).toBe('bold');
    expect(expectElement(nodes[3], 'emphasis').text).toBe('italic');
    expect(expectElement(nodes[4], 'text').text).toBe('.');
  });

  it('should prefer the unconstrained form', () => {
    const nodes = parse('**un**constrained');
    expect(expectElement(nodes[0], 'strong').text).toBe('un');
    expect(expectElement(nodes[1], 'text').text).toBe('constrained');
  });

  it('should parse nested spans inside strong text', () => {
    const [strong] = parse('*_both_*');
    const node = expectElement(strong, 'strong');
    expect(node.text).toBe('_both_');
    expect(node.children).toHaveLength(1);
    expect(expectElement(node.children[0], 'emphasis').text).toBe('both');
    expect(node.children[0].parent).toBe(node);
  });

  it('should not attach children to a span holding plain text', () => {
    const [strong] = parse('*plain*');
    expect(strong.children).toHaveLength(0);
  });

  it('should parse highlight, superscript, subscript and code', () => {
    const nodes = parse('#mark# E=mc^2^ H~2~O `npm test`');
    expect(expectElement(nodes[0], 'highlight').text).toBe('mark');
    expect(expectElement(nodes[2], 'superscript').text).toBe('2');
    expect(expectElement(nodes[4], 'subscript').text).toBe('2');
    expect(expectElement(nodes[6], 'inline-code').code).toBe('npm test');
  });

  it('should parse links with and without text', () => {
    const nodes = parse('Visit https://example.com[Example] or https://example.org');
    const first = expectElement(nodes[1], 'link');
    expect(first.url).toBe('https://example.com');
    expect(first.text).toBe('Example');

    const second = expectElement(nodes[3], 'link');
    expect(second.url).toBe('https://example.org');
    expect(second.text).toBe('https://example.org');
  });

  it('should parse inline images', () => {
    const nodes = parse('Logo: image::logo.png[Company logo]');
    const image = expectElement(nodes[1], 'image');
    expect(image.src).toBe('logo.png');
    expect(image.alt).toBe('Company logo');
  });

  it('should parse anchors and cross references', () => {
    const nodes = parse('[[intro,Introduction]]See <<intro,the intro>> and <<setup>>');
    const anchor = expectElement(nodes[0], 'anchor');
    expect(anchor.id).toBe('intro');
    expect(anchor.label).toBe('Introduction');

    const labelled = expectElement(nodes[2], 'cross-reference');
    expect(labelled.targetId).toBe('intro');
    expect(labelled.linkText).toBe('the intro');

    const bare = expectElement(nodes[4], 'cross-reference');
    expect(bare.targetId).toBe('setup');
    expect(bare.linkText).toBe('');
  });

  it('should parse generic inline macros', () => {
    const nodes = parse('Press kbd:[Ctrl+C] to copy');
    const macro = expectElement(nodes[1], 'macro');
    expect(macro.name).toBe('kbd');
    expect(macro.target).toBe('');
    expect(macro.macroType).toBe('inline');
    expect(macro.parameters.get('alt')).toBe('Ctrl+C');
  });

  it('should build typed nodes for inline image macros', () => {
    const nodes = parse('Icon image:icon.svg[width=16] here');
    const image = expectElement(nodes[1], 'image-macro');
    expect(image.source).toBe('icon.svg');
    expect(image.width).toBe(16);
    expect(image.alt).toBe('icon');
  });

  it('should number footnotes in order of appearance', () => {
    const nodes = parse('A.footnote:[First] B.footnote:disclaimer[Second] C.footnote:disclaimer[] D.footnote:[Third]');
    const footnotes = nodes.filter((node) => node.elementType === 'footnote').map((node) => expectElement(node, 'footnote'));

    expect(footnotes.map((f) => f.referenceLabel)).toEqual(['1', '2', '2', '3']);
    expect(footnotes.map((f) => f.id)).toEqual(['_footnotedef_1', 'disclaimer', 'disclaimer', '_footnotedef_3']);
    expect(footnotes.map((f) => f.isReference)).toEqual([false, false, true, false]);
    expect(footnotes[1].text).toBe('Second');
  });

  it('should share footnote numbering across calls on one parser', () => {
    const parser = new InlineParser();
    parser.parse('one footnote:[a]');
    const [, footnote] = parser.parse('two footnote:[b]');
    expect(expectElement(footnote, 'footnote').referenceLabel).toBe('2');
  });

  it('should render plain text without markup', () => {
    const parser = new InlineParser();
    const nodes = parser.parse('Use *bold* with `code` and <<ref,a link>>');
    expect(parser.toPlainText(nodes)).toBe('Use bold with code and a link');
  });

  it('should rebuild the input from text gaps and matched spans', () => {
    const text = 'Plain *strong* then `code` and https://example.com end';
    const nodes = parse(text);
    const gaps = nodes.filter((node) => node.elementType === 'text').map((node) => expectElement(node, 'text').text);
    expect(gaps).toEqual(['Plain ', ' then ', ' and ', ' end']);
  });
});
