/**
 * Tests for include directives
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { IncludeProcessor } from '../src/include/IncludeProcessor.js';
import { filterLines, filterTags, indentLines, parseLevelOffset, splitLines } from '../src/include/contentFilters.js';
import { createIncludeMacro } from '../src/model/macros.js';
import { AsciiDocParser } from '../src/parser/AsciiDocParser.js';
import { CircularIncludeError, IncludeDepthError, IncludeError } from '../src/parser/errors.js';
import { parseMacroParameters } from '../src/parser/macroParameters.js';
import { expectElement } from './helpers.js';

describe('Include content filters', () => {
  it('should split on every line ending without a trailing empty line', () => {
    expect(splitLines('a\r\nb\rc\n')).toEqual(['a', 'b', 'c']);
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
    expect(splitLines('')).toEqual([]);
  });

  it('should select line ranges in the order given', () => {
    const content = 'one\ntwo\nthree\nfour\nfive';
    expect(filterLines(content, '2..3')).toBe('two\nthree');
    expect(filterLines(content, '5,1')).toBe('five\none');
    expect(filterLines(content, '4..-1')).toBe('four\nfive');
    expect(filterLines(content, '1;3')).toBe('one\nthree');
    expect(filterLines(content, undefined)).toBe(content);
  });

  it('should skip out-of-range and malformed selections', () => {
    expect(filterLines('a\nb', '3,x,2..1')).toBe('');
  });

  it('should keep only lines inside requested tags', () => {
    const content = [
      'before',
      '// tag::setup[]',
      'install()',
      '// end::setup[]',
      '// tag::run[]',
      'run()',
      '// end::run[]',
    ].join('\n');

    expect(filterTags(content, 'setup')).toBe('install()');
    expect(filterTags(content, 'setup,run')).toBe('install()\nrun()');
    expect(filterTags(content, 'missing')).toBe('');
  });

  it('should keep lines of nested tags when the outer tag is requested', () => {
    const content = '// tag::outer[]\na\n// tag::inner[]\nb\n// end::inner[]\nc\n// end::outer[]';
    expect(filterTags(content, 'outer')).toBe('a\nb\nc');
    expect(filterTags(content, 'inner')).toBe('b');
  });

  it('should indent every line', () => {
    expect(indentLines('a\nb', '2')).toBe('  a\n  b');
    expect(indentLines('a', '0')).toBe('a');
  });

  it('should parse level offsets', () => {
    expect(parseLevelOffset('+1')).toBe(1);
    expect(parseLevelOffset('-2')).toBe(-2);
    expect(parseLevelOffset('3')).toBe(3);
    expect(parseLevelOffset('abc')).toBeUndefined();
    expect(parseLevelOffset(undefined)).toBeUndefined();
  });
});

describe('Include directives', () => {
  let dir: string;
  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'adoc-include-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should replace an include with the single element it yields', () => {
    write('part.adoc', 'Included paragraph.');
    const main = write('main.adoc', 'Intro.\n\ninclude::part.adoc[]\n');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    expect(doc.elements).toHaveLength(2);
    expect(expectElement(doc.elements[1], 'paragraph').text).toBe('Included paragraph.');
    expect(doc.source.file).toBe(main);
  });

  it('should wrap several included elements in an untitled section', () => {
    write('chapter.adoc', '== Chapter\n\nChapter text.');
    const main = write('main.adoc', 'include::chapter.adoc[]');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    const wrapper = expectElement(doc.elements[0], 'section');
    expect(wrapper.level).toBe(0);
    expect(wrapper.title).toBe('');
    expect(wrapper.children.map((child) => child.elementType)).toEqual(['section', 'paragraph']);
    expect(wrapper.children[0].parent).toBe(wrapper);
  });

  it('should resolve nested includes relative to the including file', () => {
    write('parts/outer.adoc', 'include::inner.adoc[]');
    write('parts/inner.adoc', 'Deep text.');
    const main = write('main.adoc', 'include::parts/outer.adoc[]');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    expect(expectElement(doc.elements[0], 'paragraph').text).toBe('Deep text.');
  });

  it('should resolve includes of a string against basePath', () => {
    write('snippet.adoc', 'From snippet.');
    const doc = new AsciiDocParser({ silent: true }).parse('include::snippet.adoc[]', { basePath: dir });
    expect(expectElement(doc.elements[0], 'paragraph').text).toBe('From snippet.');
  });

  it('should shift included section levels by leveloffset', () => {
    write('chapter.adoc', '== Chapter\n\n=== Detail');
    const main = write('main.adoc', 'include::chapter.adoc[leveloffset=+1]');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    const wrapper = expectElement(doc.elements[0], 'section');
    const levels = wrapper.children.map((child) => expectElement(child, 'section').level);
    expect(levels).toEqual([3, 4]);
  });

  it('should never shift a section below level 1', () => {
    write('chapter.adoc', '== Chapter');
    const main = write('main.adoc', 'include::chapter.adoc[leveloffset=-5]');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    expect(expectElement(doc.elements[0], 'section').level).toBe(1);
  });

  it('should apply lines, tags and indent filters', () => {
    write('code.adoc', 'skip\n// tag::keep[]\nKept line.\n// end::keep[]\nlast');
    const main = write('main.adoc', 'include::code.adoc[lines="1,5"]\n\ninclude::code.adoc[tag=keep]');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    expect(doc.elements.map((element) => expectElement(element, 'paragraph').text)).toEqual(['skip\nlast', 'Kept line.']);
  });

  it('should share document attributes with included files', () => {
    write('attrs.adoc', ':product: Widget');
    const main = write('main.adoc', 'include::attrs.adoc[]\n\n:edition: 2');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    expect(doc.attributes.get('product')).toBe('Widget');
    expect(doc.attributes.get('edition')).toBe('2');
  });

  it('should keep the macro and record a diagnostic for a missing file', () => {
    const main = write('main.adoc', 'include::missing.adoc[]');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const doc = new AsciiDocParser().parseFile(main);
    const macro = expectElement(doc.elements[0], 'include-macro');
    expect(macro.filePath).toBe('missing.adoc');
    expect(doc.diagnostics).toHaveLength(1);
    expect(doc.diagnostics[0]).toMatchObject({
      kind: 'include-failed',
      message: `Include file not found: ${path.join(dir, 'missing.adoc')}`,
      line: 1,
      file: main,
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should not warn when silent', () => {
    const main = write('main.adoc', 'include::missing.adoc[]');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    new AsciiDocParser({ silent: true }).parseFile(main);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should throw for a missing file with strictIncludes', () => {
    const main = write('main.adoc', 'include::missing.adoc[]');
    const parser = new AsciiDocParser({ strictIncludes: true });

    expect(() => parser.parseFile(main)).toThrow(IncludeError);
    expect(() => parser.parseFile(main)).toThrow(`Include file not found: ${path.join(dir, 'missing.adoc')}`);
  });

  it('should skip missing optional includes', () => {
    const main = write('main.adoc', 'include::missing.adoc[opts=optional]');

    const doc = new AsciiDocParser({ strictIncludes: true, silent: true }).parseFile(main);
    expect(expectElement(doc.elements[0], 'include-macro').optional).toBe(true);
    expect(doc.diagnostics.map((d) => d.kind)).toEqual(['include-skipped']);
  });

  it('should reject a file that includes itself', () => {
    const main = write('self.adoc', 'include::self.adoc[]');

    expect(() => new AsciiDocParser({ silent: true }).parseFile(main)).toThrow(
      "Circular include detected: self.adoc -> self.adoc. File 'self.adoc' is already being processed in the include chain."
    );
  });

  it('should reject include cycles through other files', () => {
    const a = write('a.adoc', 'include::b.adoc[]');
    write('b.adoc', 'include::a.adoc[]');

    let caught: unknown;
    try {
      new AsciiDocParser({ silent: true }).parseFile(a);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CircularIncludeError);
    if (caught instanceof CircularIncludeError) {
      expect(caught.message).toBe(
        "Circular include detected: a.adoc -> b.adoc -> a.adoc. File 'a.adoc' is already being processed in the include chain."
      );
      expect(caught.includeChain).toEqual([a, path.join(dir, 'b.adoc')]);
    }
  });

  it('should allow the same file to be included twice in sequence', () => {
    write('shared.adoc', 'Shared.');
    const main = write('main.adoc', 'include::shared.adoc[]\n\ninclude::shared.adoc[]');

    const doc = new AsciiDocParser({ silent: true }).parseFile(main);
    expect(doc.elements).toHaveLength(2);
  });

  it('should stop at the maximum include depth', () => {
    write('b.adoc', 'include::c.adoc[]');
    write('c.adoc', 'Leaf.');
    const a = write('a.adoc', 'include::b.adoc[]');

    expect(() => new AsciiDocParser({ maxIncludeDepth: 2 }).parseFile(a)).toThrow(IncludeDepthError);
    const doc = new AsciiDocParser({ maxIncludeDepth: 3 }).parseFile(a);
    expect(expectElement(doc.elements[0], 'paragraph').text).toBe('Leaf.');
  });
});

describe('IncludeProcessor', () => {
  const processor = new IncludeProcessor(new AsciiDocParser());

  it('should resolve relative paths against a file or a directory', () => {
    const base = path.resolve('docs');
    expect(processor.resolveIncludePath('a.adoc', base)).toBe(path.join(base, 'a.adoc'));
    expect(processor.resolveIncludePath('../b.adoc', base)).toBe(path.resolve('b.adoc'));
  });

  it('should keep absolute paths', () => {
    const absolute = path.resolve('elsewhere', 'c.adoc');
    expect(processor.resolveIncludePath(absolute, path.resolve('docs'))).toBe(absolute);
  });

  it('should detect circular references case-insensitively', () => {
    const stack = [path.resolve('docs', 'Main.adoc')];
    expect(processor.wouldCreateCircularReference(path.resolve('docs', 'main.adoc'), stack)).toBe(true);
    expect(processor.wouldCreateCircularReference(path.resolve('docs', 'other.adoc'), stack)).toBe(false);
    expect(processor.wouldCreateCircularReference('', stack)).toBe(false);
  });

  it('should return no elements for a missing optional include', () => {
    const macro = createIncludeMacro('nowhere.adoc', parseMacroParameters('optional=true'));
    expect(processor.processInclude(macro, os.tmpdir(), [])).toEqual([]);
  });
});
