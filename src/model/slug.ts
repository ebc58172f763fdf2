/**
 * Generate a URL slug from heading text
 *
 * @example
 * generateSlug('Getting Started!')  // 'getting-started'
 * generateSlug('  A -- B ')         // 'a-b'
 */
export function generateSlug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '') // Remove special chars
    .replace(/\s+/g, '-') // Spaces to hyphens
    .replace(/-+/g, '-') // Collapse multiple hyphens
    .replace(/^-|-$/g, ''); // Trim hyphens
}
