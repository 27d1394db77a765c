/**
 * Turns the shape elements under a diagram's root container into ShapeRecords.
 */

import type { AttributeMap, ShapeKind, ShapeRecord } from '../types/records.js';
import { ElementTag } from '../types/records.js';
import type { XmlElement } from '../core/XmlTree.js';
import { DocumentParseError, UnhandledShapeKindError } from '../core/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { parseCell, parseObject, parseUserObject } from './ElementParsers.js';

/**
 * Maps a shape element's tag to its kind.
 * @returns undefined for tags that carry no parser
 */
export function shapeKindOf(tagName: string): ShapeKind | undefined {
  switch (tagName) {
    case ElementTag.object:
      return 'object';
    case ElementTag.cell:
      return 'cell';
    case ElementTag.userObject:
      return 'userObject';
    default:
      return undefined;
  }
}

/**
 * Parses one shape element into its folded attribute mapping.
 * @param index Position among the root container's children, used in errors
 */
export function parseShapeElement(element: XmlElement, index = 0): AttributeMap {
  const kind = shapeKindOf(element.tagName);
  switch (kind) {
    case 'object':
      return parseObject(element);
    case 'cell':
      return parseCell(element);
    case 'userObject':
      return parseUserObject(element);
    case undefined:
      throw new UnhandledShapeKindError(element.tagName, index);
  }
}

/**
 * Builds the immutable record for a folded attribute mapping.
 * @returns undefined when the mapping carries no id
 */
export function toShapeRecord(attributes: AttributeMap): ShapeRecord | undefined {
  const id = attributes.id ?? null;
  if (id === null) {
    return undefined;
  }

  return Object.freeze({
    id,
    value: attributes.value ?? null,
    label: attributes.label ?? null,
    tags: attributes.tags ?? null,
    style: attributes.style ?? null,
    parent: attributes.parent ?? null,
    vertex: attributes.vertex ?? null,
    x: attributes.x ?? null,
    y: attributes.y ?? null,
    width: attributes.width ?? null,
    height: attributes.height ?? null,
  });
}

/**
 * Configuration for ShapeParser.
 */
export interface ShapeParserConfig {
  /** Path or label of the document, used in errors */
  source: string;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Parses the shape elements of one diagram.
 */
export class ShapeParser {
  private readonly source: string;
  private readonly logger: ILogger;

  constructor(config: ShapeParserConfig) {
    this.source = config.source;
    this.logger = config.logger ?? createLogger('warn', 'ShapeParser');
  }

  /**
   * Parses a single shape element.
   * @param index Position among the root container's children
   */
  parseShape(element: XmlElement, index: number): ShapeRecord {
    const attributes = parseShapeElement(element, index);
    const record = toShapeRecord(attributes);
    if (!record) {
      throw new DocumentParseError(
        this.source,
        `shape element '${element.tagName}' at position ${index} has no id`
      );
    }

    this.logger.debug('Parsed shape', { index, tag: element.tagName, id: record.id });
    return record;
  }

  /**
   * Parses all shape elements, keeping their order.
   */
  parseShapes(elements: readonly XmlElement[]): ShapeRecord[] {
    return elements.map((element, index) => this.parseShape(element, index));
  }
}

/**
 * Creates a ShapeParser for the given document.
 */
export function createShapeParser(config: ShapeParserConfig): ShapeParser {
  return new ShapeParser(config);
}
