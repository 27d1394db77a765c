/**
 * Type definitions for drawio-shapes.
 */

// Options and configuration
export type { LogLevel, ReportFormat, DiagramReaderOptions, ReportOptions } from './options.js';
export { DEFAULT_READER_OPTIONS, DEFAULT_REPORT_OPTIONS } from './options.js';

// Records
export type {
  AttributeValue,
  AttributeMap,
  ShapeKind,
  ElementTagName,
  ShapeRecord,
  DiagramDocument,
} from './records.js';
export { ElementTag, SHAPE_RECORD_FIELDS } from './records.js';
