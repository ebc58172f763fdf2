/**
 * Content filters applied to included files, in this order:
 * lines, tags, indent.
 *
 * @since 2025-12-10
 */

const TAG_START = /^\/\/\s*tag::([^[\]]+)\[\]$/;
const TAG_END = /^\/\/\s*end::([^[\]]+)\[\]$/;

/**
 * Split on any line ending; a final line break does not add an empty line
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Keep the lines selected by `selector`: comma-separated line numbers and
 * `start..end` ranges, 1-based and inclusive; `-1` means the last line.
 * Selections are concatenated in the order given.
 *
 * @example
 * filterLines('a\nb\nc\nd', '2..3')    // 'b\nc'
 * filterLines('a\nb\nc\nd', '1,3..-1') // 'a\nc\nd'
 */
export function filterLines(content: string, selector: string | undefined): string {
  if (!selector || !selector.trim()) return content;

  const lines = splitLines(content);
  const selected: string[] = [];

  for (const part of selector.split(/[,;]/)) {
    const range = part.trim();
    if (!range) continue;

    if (range.includes('..')) {
      const [from, to] = range.split('..');
      const start = parseLineNumber(from, lines.length);
      const end = parseLineNumber(to, lines.length);
      if (start > 0 && end > 0 && start <= end) {
        for (let i = start - 1; i < end && i < lines.length; i++) {
          selected.push(lines[i]);
        }
      }
    } else {
      const lineNumber = parseLineNumber(range, lines.length);
      if (lineNumber > 0 && lineNumber <= lines.length) {
        selected.push(lines[lineNumber - 1]);
      }
    }
  }

  return selected.join('\n');
}

/**
 * Keep the lines inside `// tag::NAME[]` ... `// end::NAME[]` regions whose
 * NAME is requested. Tag marker lines are always dropped; a line is kept
 * when any currently open tag is requested.
 */
export function filterTags(content: string, selector: string | undefined): string {
  if (!selector || !selector.trim()) return content;

  const requested = new Set(
    selector
      .split(/[,;]/)
      .map((tag) => tag.trim())
      .filter(Boolean)
  );
  const openTags = new Set<string>();
  const selected: string[] = [];

  for (const line of splitLines(content)) {
    const trimmed = line.trim();

    const start = TAG_START.exec(trimmed);
    if (start) {
      openTags.add(start[1].trim());
      continue;
    }

    const end = TAG_END.exec(trimmed);
    if (end) {
      openTags.delete(end[1].trim());
      continue;
    }

    if ([...openTags].some((tag) => requested.has(tag))) {
      selected.push(line);
    }
  }

  return selected.join('\n');
}

/**
 * Prefix every line with `selector` spaces
 */
export function indentLines(content: string, selector: string | undefined): string {
  if (!selector) return content;
  const width = Number.parseInt(selector, 10);
  if (!Number.isFinite(width) || width <= 0) return content;

  const padding = ' '.repeat(width);
  return splitLines(content)
    .map((line) => padding + line)
    .join('\n');
}

/**
 * Parse a `leveloffset` value (`+1`, `-1`, `2`); undefined when absent or invalid
 */
export function parseLevelOffset(selector: string | undefined): number | undefined {
  if (!selector) return undefined;
  const match = /^\s*([+-]?)(\d+)\s*$/.exec(selector);
  if (!match) return undefined;
  const value = Number.parseInt(match[2], 10);
  return match[1] === '-' ? -value : value;
}

function parseLineNumber(selector: string | undefined, totalLines: number): number {
  const value = (selector ?? '').trim();
  if (!value) return 0;
  if (value === '-1') return totalLines;
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : 0;
}
