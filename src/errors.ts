/**
 * Base class for errors raised (not collected) by the conformance checker
 */
export class ConformanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The caller asked for a type outside the closed extension type set
 */
export class UnknownTypeError extends ConformanceError {
  public readonly typeName: string;

  constructor(typeName: string) {
    super(`Unknown extension type '${typeName}'`);
    this.typeName = typeName;
  }
}

/**
 * The input is not a tree the checker can walk, or the parser rejected it
 */
export class MalformedInputError extends ConformanceError {
  public readonly reason: string;
  public readonly path?: string;

  constructor(reason: string, path?: string) {
    super(path ? `Malformed input at ${path}: ${reason}` : `Malformed input: ${reason}`);
    this.reason = reason;
    this.path = path;
  }
}
