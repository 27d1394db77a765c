/**
 * Core module exports.
 */

export { DiagramReader, readDiagram, readDiagramDocument, parseDiagramXml } from './DiagramReader.js';
export { DiagramError, TagMismatchError, UnhandledShapeKindError, DocumentParseError } from './errors.js';
export {
  parseXmlPreservingOrder,
  toXmlElements,
  parseDocumentElement,
  findXmlSyntaxIssue,
  findChild,
  findFirstDescendant,
  getAttribute,
} from './XmlTree.js';
export type { XmlElement, XmlSyntaxIssue, OrderedXmlNode, OrderedXmlOutput } from './XmlTree.js';
