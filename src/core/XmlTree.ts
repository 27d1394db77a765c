import { XMLParser, XMLValidator, type X2jOptions } from 'fast-xml-parser';

/**
 * An element of a parsed document, with its children in document order.
 */
export interface XmlElement {
  /** The tag name of the element */
  readonly tagName: string;
  /** The element's attributes, unprefixed and unparsed */
  readonly attributes: Readonly<Record<string, string>>;
  /** Child elements in document order */
  readonly children: readonly XmlElement[];
  /** Concatenated text content of the element itself */
  readonly text: string;
}

/**
 * Represents a single element in the ordered XML output from fast-xml-parser.
 * Each element has one key (the tag name) with children as value, and optionally ':@' for attributes.
 */
export interface OrderedXmlNode {
  [tagName: string]: OrderedXmlOutput | string | Record<string, string> | undefined;
}

/**
 * Type representing the output of fast-xml-parser with preserveOrder: true.
 */
export type OrderedXmlOutput = OrderedXmlNode[];

/**
 * XML attribute prefix used by fast-xml-parser.
 */
const ATTR_PREFIX = '@_';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

/**
 * Parser options with preserveOrder enabled.
 * Format: [{ tagName: [...children], ':@': { attrs } }, ...]
 *
 * Attribute values are kept verbatim: no trimming, no number parsing.
 */
const ORDERED_XML_PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  removeNSPrefix: false,
  parseAttributeValue: false,
  trimValues: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  htmlEntities: true,
  preserveOrder: true,
};

const orderedXmlParserSingleton = new XMLParser(ORDERED_XML_PARSER_OPTIONS);

/**
 * Location of a well-formedness violation.
 */
export interface XmlSyntaxIssue {
  message: string;
  line: number;
  column: number;
}

/**
 * Checks that `xml` is well formed.
 * @returns undefined when it is, otherwise the first problem found
 */
export function findXmlSyntaxIssue(xml: string): XmlSyntaxIssue | undefined {
  const result = XMLValidator.validate(xml);
  if (result === true) {
    return undefined;
  }
  return { message: result.err.msg, line: result.err.line, column: result.err.col };
}

/**
 * Parses an XML string with preserved document order.
 */
export function parseXmlPreservingOrder(xmlString: string): OrderedXmlOutput {
  const parsed: OrderedXmlOutput = orderedXmlParserSingleton.parse(xmlString);
  return parsed;
}

function readAttributes(node: OrderedXmlNode): Record<string, string> {
  const raw = node[ATTRIBUTES_KEY];
  const attributes: Record<string, string> = {};
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return attributes;
  }

  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
    attributes[name] = value;
  }
  return attributes;
}

/**
 * Converts ordered parser output into XmlElements. Text nodes are folded into
 * the parent's `text`; they do not appear as children.
 */
export function toXmlElements(ordered: OrderedXmlOutput): XmlElement[] {
  const elements: XmlElement[] = [];

  for (const node of ordered) {
    // Each node has one tag key plus optional ':@'; '#text' and '?xml' are not elements
    const tagNames = Object.keys(node).filter(
      (key) => key !== ATTRIBUTES_KEY && !key.startsWith('#') && !key.startsWith('?')
    );

    for (const tagName of tagNames) {
      const content = node[tagName];
      const childNodes = Array.isArray(content) ? content : [];

      elements.push({
        tagName,
        attributes: readAttributes(node),
        children: toXmlElements(childNodes),
        text: collectText(childNodes),
      });
    }
  }

  return elements;
}

function collectText(ordered: OrderedXmlOutput): string {
  let text = '';
  for (const node of ordered) {
    const value = node[TEXT_KEY];
    if (typeof value === 'string') {
      text += value;
    }
  }
  return text;
}

/**
 * Parses a document and returns its document element.
 * Callers are expected to have validated `xml`; undefined means no element was found.
 */
export function parseDocumentElement(xml: string): XmlElement | undefined {
  return toXmlElements(parseXmlPreservingOrder(xml))[0];
}

/**
 * Returns the first direct child with the given tag.
 */
export function findChild(element: XmlElement, tagName: string): XmlElement | undefined {
  return element.children.find((child) => child.tagName === tagName);
}

/**
 * Returns the first descendant with the given tag, searching the whole
 * subtree in document order (pre-order), not only direct children.
 * The element itself is not considered.
 */
export function findFirstDescendant(element: XmlElement, tagName: string): XmlElement | undefined {
  for (const child of element.children) {
    if (child.tagName === tagName) {
      return child;
    }
    const nested = findFirstDescendant(child, tagName);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Returns the attribute's value, or undefined when the element lacks it.
 */
export function getAttribute(element: XmlElement, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(element.attributes, name) ? element.attributes[name] : undefined;
}
