/**
 * Types for HTML output
 */

export interface HtmlConverterOptions {
  /** Wrap the body in a full `<html>` page (default: false) */
  standalone?: boolean;

  /** Page title for standalone output; falls back to the document title */
  title?: string;

  /** Append footnote definitions after the body (default: true) */
  footnotes?: boolean;
}
