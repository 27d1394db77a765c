/**
 * Parsers for the element kinds of a draw.io diagram.
 *
 * Nesting is at most three levels deep: an `object` or `UserObject` wraps an
 * `mxCell`, which wraps an `mxGeometry`. Each parser reads its own attributes
 * and folds in its nested element's as fallback values. Nested elements are
 * found by a full-subtree search in document order, so an intermediate
 * wrapper element does not hide them.
 */

import type { AttributeMap } from '../types/records.js';
import { ElementTag, type ElementTagName } from '../types/records.js';
import type { XmlElement } from '../core/XmlTree.js';
import { findFirstDescendant } from '../core/XmlTree.js';
import { TagMismatchError } from '../core/errors.js';
import { extractAttributes, mergeAttributes } from './attributes.js';

export const GEOMETRY_ATTRIBUTES = ['x', 'y', 'width', 'height'] as const;
export const CELL_ATTRIBUTES = ['value', 'style', 'id', 'parent', 'vertex'] as const;
export const OBJECT_ATTRIBUTES = ['label', 'id', 'tags'] as const;
export const USER_OBJECT_ATTRIBUTES = ['label', 'tags', 'id'] as const;

const NO_ATTRIBUTES: AttributeMap = {};

function assertTag(element: XmlElement, expected: ElementTagName): void {
  if (element.tagName !== expected) {
    throw new TagMismatchError(expected, element.tagName);
  }
}

/**
 * Extracts position and size from an `mxGeometry` element.
 */
export function parseGeometry(element: XmlElement): AttributeMap {
  assertTag(element, ElementTag.geometry);
  return extractAttributes(element, GEOMETRY_ATTRIBUTES);
}

/**
 * Extracts an `mxCell`'s attributes, falling back to its geometry's.
 */
export function parseCell(element: XmlElement): AttributeMap {
  assertTag(element, ElementTag.cell);
  const cell = extractAttributes(element, CELL_ATTRIBUTES);

  const geometryElement = findFirstDescendant(element, ElementTag.geometry);
  const geometry = geometryElement ? parseGeometry(geometryElement) : NO_ATTRIBUTES;

  return mergeAttributes(cell, geometry);
}

/**
 * Parses the first `mxCell` below `element`, or returns an empty mapping.
 */
function parseNestedCell(element: XmlElement): AttributeMap {
  const cellElement = findFirstDescendant(element, ElementTag.cell);
  return cellElement ? parseCell(cellElement) : NO_ATTRIBUTES;
}

/**
 * Extracts an `object` element's attributes, falling back to its cell's.
 * Custom properties other than label and tags are not read.
 */
export function parseObject(element: XmlElement): AttributeMap {
  assertTag(element, ElementTag.object);
  const object = extractAttributes(element, OBJECT_ATTRIBUTES);
  return mergeAttributes(object, parseNestedCell(element));
}

/**
 * Extracts a `UserObject` element's attributes, falling back to its cell's.
 */
export function parseUserObject(element: XmlElement): AttributeMap {
  assertTag(element, ElementTag.userObject);
  const userObject = extractAttributes(element, USER_OBJECT_ATTRIBUTES);
  return mergeAttributes(userObject, parseNestedCell(element));
}
