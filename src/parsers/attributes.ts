/**
 * Attribute harvesting and folding shared by the element parsers.
 */

import type { AttributeMap, AttributeValue } from '../types/records.js';
import type { XmlElement } from '../core/XmlTree.js';
import { getAttribute } from '../core/XmlTree.js';

/**
 * Reads the named attributes off a single element.
 * The result has exactly the keys in `names`; missing attributes map to null.
 * Children are not looked at.
 */
export function extractAttributes(element: XmlElement, names: readonly string[]): AttributeMap {
  const attributes: Record<string, AttributeValue> = {};
  for (const name of names) {
    attributes[name] = getAttribute(element, name) ?? null;
  }
  return attributes;
}

/**
 * Returns `primary` unless it is absent, in which case `fallback` (absent too, possibly).
 */
export function preferDefined<T>(primary: T | null | undefined, fallback: T | null | undefined): T | null {
  return primary ?? fallback ?? null;
}

/**
 * Merges two mappings describing the same shape.
 *
 * Keys of both are kept. A non-null value in `primary` wins; a null in
 * `primary` yields to whatever `secondary` holds for that key, null included.
 * Keys only in `secondary` are copied over. Nesting merges folds fallbacks
 * transitively: merge(a, merge(b, c)) and merge(merge(a, b), c) agree per key.
 */
export function mergeAttributes(primary: AttributeMap, secondary: AttributeMap): AttributeMap {
  const merged: Record<string, AttributeValue> = { ...secondary };
  for (const [key, value] of Object.entries(primary)) {
    merged[key] = preferDefined(value, secondary[key]);
  }
  return merged;
}
