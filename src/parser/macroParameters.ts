/**
 * Macro parameter list parsing
 *
 * `alt text,width=300,"a, b",role='x'` splits on top-level commas (not inside
 * quotes). `key=value` parts are named parameters with surrounding quotes
 * removed. The first positional part is stored as both `alt` and `title`;
 * a positional part at index i > 0 is stored as `param<i>`.
 *
 * @since 2025-12-09
 */

/**
 * Split on commas that are not inside single or double quotes
 */
export function splitMacroParameters(input: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const ch of input) {
    if (quote === null && (ch === '"' || ch === "'")) {
      quote = ch;
      current += ch;
    } else if (quote !== null && ch === quote) {
      quote = null;
      current += ch;
    } else if (quote === null && ch === ',') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

export function parseMacroParameters(input: string): Map<string, string> {
  const parameters = new Map<string, string>();
  if (!input) return parameters;

  splitMacroParameters(input).forEach((raw, index) => {
    const part = raw.trim();
    if (!part) return;

    const equalIndex = part.indexOf('=');
    if (equalIndex > 0) {
      const key = part.slice(0, equalIndex).trim();
      parameters.set(key, unquote(part.slice(equalIndex + 1).trim()));
    } else if (index === 0) {
      parameters.set('alt', part);
      parameters.set('title', part);
    } else {
      parameters.set(`param${index}`, part);
    }
  });

  return parameters;
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}
