import * as fs from 'node:fs';
import type { DiagramDocument, DiagramReaderOptions, ShapeRecord } from '../types/index.js';
import { DEFAULT_READER_OPTIONS } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { createShapeParser } from '../parsers/ShapeParser.js';
import { DocumentParseError } from './errors.js';
import type { XmlElement } from './XmlTree.js';
import { findChild, findXmlSyntaxIssue, getAttribute, parseDocumentElement } from './XmlTree.js';

/**
 * Structural path from the document element to the shape container.
 * The first `diagram` page is read; further pages are ignored.
 */
const SHAPE_CONTAINER_PATH = ['diagram', 'mxGraphModel', 'root'] as const;

/**
 * Reader for uncompressed draw.io documents.
 *
 * Reading is synchronous and single pass: the file is read into memory and
 * closed before the tree is walked, and every failure propagates to the caller.
 *
 * @example
 * ```typescript
 * const reader = new DiagramReader({ logLevel: 'debug' });
 * for (const shape of reader.read('architecture.drawio')) {
 *   console.log(shape.id, shape.label ?? shape.value);
 * }
 * ```
 */
export class DiagramReader {
  private readonly logger: ILogger;

  constructor(options: DiagramReaderOptions = {}) {
    const resolved = { ...DEFAULT_READER_OPTIONS, ...options };
    this.logger = options.logger ?? createLogger(resolved.logLevel, 'DiagramReader');
  }

  /**
   * Reads a diagram file and returns its shapes in document order.
   */
  read(path: string): ShapeRecord[] {
    return this.readDocument(path).shapes;
  }

  /**
   * Reads a diagram file and returns its first page with its shapes.
   */
  readDocument(path: string): DiagramDocument {
    this.logger.debug('Reading diagram', { path });

    let xml: string;
    try {
      xml = fs.readFileSync(path, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Failed to read diagram', { path, error: message });
      throw new DocumentParseError(path, `cannot read file: ${message}`, { cause: error });
    }

    return this.parseDocument(xml, path);
  }

  /**
   * Parses diagram markup held in memory.
   * @param source Path or label used in errors and in the result
   */
  parseDocument(xml: string, source = '<string>'): DiagramDocument {
    const issue = findXmlSyntaxIssue(xml);
    if (issue) {
      throw new DocumentParseError(
        source,
        `malformed markup at line ${issue.line}, column ${issue.column}: ${issue.message}`
      );
    }

    const documentElement = parseDocumentElement(xml);
    if (!documentElement) {
      throw new DocumentParseError(source, 'document has no root element');
    }

    const page = this.locatePage(documentElement, source);
    const container = this.locateShapeContainer(page, source);
    const shapeParser = createShapeParser({ source, logger: this.logger.child('ShapeParser') });
    const shapes = shapeParser.parseShapes(container.children);

    this.logger.info('Diagram parsed', { source, shapes: shapes.length });

    return {
      source,
      name: getAttribute(page, 'name') ?? null,
      id: getAttribute(page, 'id') ?? null,
      shapes,
    };
  }

  private locatePage(documentElement: XmlElement, source: string): XmlElement {
    const [pageTag] = SHAPE_CONTAINER_PATH;
    const page = findChild(documentElement, pageTag);
    if (!page) {
      throw new DocumentParseError(
        source,
        `missing '${pageTag}' element under '${documentElement.tagName}'`
      );
    }
    return page;
  }

  private locateShapeContainer(page: XmlElement, source: string): XmlElement {
    let current = page;
    for (const tagName of SHAPE_CONTAINER_PATH.slice(1)) {
      const next = findChild(current, tagName);
      if (!next) {
        if (current === page && page.children.length === 0 && page.text.trim() !== '') {
          throw new DocumentParseError(
            source,
            'diagram content is compressed; save the file uncompressed to read its shapes'
          );
        }
        throw new DocumentParseError(source, `missing '${tagName}' element under '${current.tagName}'`);
      }
      current = next;
    }
    return current;
  }
}

/**
 * Reads a diagram file and returns its shapes in document order.
 */
export function readDiagram(path: string, options?: DiagramReaderOptions): ShapeRecord[] {
  return new DiagramReader(options).read(path);
}

/**
 * Reads a diagram file and returns its first page with its shapes.
 */
export function readDiagramDocument(path: string, options?: DiagramReaderOptions): DiagramDocument {
  return new DiagramReader(options).readDocument(path);
}

/**
 * Parses diagram markup held in memory and returns its shapes in document order.
 */
export function parseDiagramXml(xml: string, source?: string, options?: DiagramReaderOptions): ShapeRecord[] {
  return new DiagramReader(options).parseDocument(xml, source).shapes;
}
