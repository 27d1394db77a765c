/**
 * Error kinds raised while reading diagrams.
 * None of them is recovered internally; the command line is the only catcher.
 */

/**
 * Base class for every error raised by the reader and the parsers.
 */
export class DiagramError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DiagramError';
  }
}

/**
 * A parser was handed an element of another kind.
 */
export class TagMismatchError extends DiagramError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Element should be of type '${expected}' not '${actual}'`);
    this.name = 'TagMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A shape element under the root container has no registered parser.
 */
export class UnhandledShapeKindError extends DiagramError {
  readonly tagName: string;
  /** Position of the element among the root container's children */
  readonly index: number;

  constructor(tagName: string, index: number) {
    super(`No parser for shape element '${tagName}' at position ${index}`);
    this.name = 'UnhandledShapeKindError';
    this.tagName = tagName;
    this.index = index;
  }
}

/**
 * The document could not be loaded or does not have the diagram structure.
 */
export class DocumentParseError extends DiagramError {
  /** Path or label of the document */
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`${source}: ${message}`, options);
    this.name = 'DocumentParseError';
    this.source = source;
  }
}
