/**
 * Document model
 *
 * Typed element tree produced by the parser:
 * - Node kinds (closed union on `elementType`)
 * - Factories and parent/child bookkeeping
 * - Macro nodes with typed parameters
 * - Tree queries
 *
 * @since 2025-12-08
 */

export * from './elements.js';
export {
  createMacroElement,
  createMacro,
  createImageMacro,
  createVideoMacro,
  createIncludeMacro,
  parseFlag,
} from './macros.js';
export { DocumentTree, queryDocument } from './DocumentTree.js';
export { generateSlug } from './slug.js';
export type * from './types.js';
