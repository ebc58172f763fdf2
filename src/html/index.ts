/**
 * HTML output
 *
 * @since 2025-12-11
 */

export { HtmlConverter } from './HtmlConverter.js';
export { escapeHtml } from './escape.js';
export type { HtmlConverterOptions } from './types.js';
