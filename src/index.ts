/**
 * drawio-shapes - shape extraction for draw.io diagrams
 *
 * Reads uncompressed draw.io documents into flat, typed shape records and
 * formats them as a table.
 */

// Main entry points
export { DiagramReader, readDiagram, readDiagramDocument, parseDiagramXml } from './core/DiagramReader.js';

// Types - Options and records
export type {
  LogLevel,
  ReportFormat,
  DiagramReaderOptions,
  ReportOptions,
  AttributeValue,
  AttributeMap,
  ShapeKind,
  ElementTagName,
  ShapeRecord,
  DiagramDocument,
} from './types/index.js';
export { DEFAULT_READER_OPTIONS, DEFAULT_REPORT_OPTIONS, ElementTag, SHAPE_RECORD_FIELDS } from './types/index.js';

// Errors
export { DiagramError, TagMismatchError, UnhandledShapeKindError, DocumentParseError } from './core/errors.js';

// Parser components (for advanced usage)
export {
  extractAttributes,
  mergeAttributes,
  preferDefined,
  parseGeometry,
  parseCell,
  parseObject,
  parseUserObject,
  shapeKindOf,
  parseShapeElement,
  toShapeRecord,
  ShapeParser,
} from './parsers/index.js';

// XML tree (for advanced usage)
export { parseDocumentElement, findChild, findFirstDescendant, getAttribute } from './core/index.js';
export type { XmlElement } from './core/index.js';

// Report
export { buildShapeRows, formatShapeTable, renderShapeTable, SHAPE_TABLE_COLUMNS } from './report/index.js';
export type { ShapeRow } from './report/index.js';

// Utilities
export { Logger, createLogger } from './utils/index.js';
export type { ILogger, LogSink } from './utils/index.js';
