/**
 * Parser module for draw.io element parsing.
 */

export { extractAttributes, mergeAttributes, preferDefined } from './attributes.js';

export {
  parseGeometry,
  parseCell,
  parseObject,
  parseUserObject,
  GEOMETRY_ATTRIBUTES,
  CELL_ATTRIBUTES,
  OBJECT_ATTRIBUTES,
  USER_OBJECT_ATTRIBUTES,
} from './ElementParsers.js';

export {
  ShapeParser,
  createShapeParser,
  shapeKindOf,
  parseShapeElement,
  toShapeRecord,
  type ShapeParserConfig,
} from './ShapeParser.js';
