/**
 * Shared test helpers
 */
import { expect } from 'vitest';
import type { DocumentElement, ElementOf, ElementType } from '../src/model/types.js';

/**
 * Assert the element kind and narrow to it
 */
export function expectElement<T extends ElementType>(
  element: DocumentElement | null | undefined,
  elementType: T
): ElementOf<T> {
  expect(element?.elementType).toBe(elementType);
  if (!element || !isElementOf(element, elementType)) {
    throw new Error(`Expected ${elementType}, got ${element?.elementType ?? 'nothing'}`);
  }
  return element;
}

function isElementOf<T extends ElementType>(node: DocumentElement, elementType: T): node is ElementOf<T> {
  return node.elementType === elementType;
}
