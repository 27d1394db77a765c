/**
 * Value of a harvested attribute. `null` marks an attribute the source element
 * does not carry; an attribute that is present but empty stays `''`.
 */
export type AttributeValue = string | null;

/**
 * Attribute name to value mapping harvested from one element, or folded from
 * several nesting levels.
 */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/**
 * Closed set of shape kinds found directly under a diagram's root container.
 */
export type ShapeKind = 'object' | 'cell' | 'userObject';

/**
 * XML tag names of the elements the parsers understand.
 */
export const ElementTag = {
  geometry: 'mxGeometry',
  cell: 'mxCell',
  object: 'object',
  userObject: 'UserObject',
} as const;

export type ElementTagName = (typeof ElementTag)[keyof typeof ElementTag];

/**
 * One shape of a diagram, normalized from its element and the cell and
 * geometry nested inside it.
 *
 * Geometry values are kept as the numeric text found in the document.
 * `parent` is the raw parent cell id; it is not resolved.
 */
export interface ShapeRecord {
  readonly id: string;
  readonly value: AttributeValue;
  readonly label: AttributeValue;
  readonly tags: AttributeValue;
  readonly style: AttributeValue;
  readonly parent: AttributeValue;
  readonly vertex: AttributeValue;
  readonly x: AttributeValue;
  readonly y: AttributeValue;
  readonly width: AttributeValue;
  readonly height: AttributeValue;
}

/**
 * Field names of a ShapeRecord, in report order.
 */
export const SHAPE_RECORD_FIELDS = [
  'id',
  'value',
  'label',
  'tags',
  'style',
  'parent',
  'vertex',
  'x',
  'y',
  'width',
  'height',
] as const satisfies readonly (keyof ShapeRecord)[];

/**
 * Shapes of one diagram page together with the page's identification.
 */
export interface DiagramDocument {
  /** Path or label the document was read from */
  source: string;
  /** `name` attribute of the diagram page */
  name: AttributeValue;
  /** `id` attribute of the diagram page */
  id: AttributeValue;
  /** Shapes in document order */
  shapes: ShapeRecord[];
}
