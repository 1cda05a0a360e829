/**
 * Error classes for the tiling library.
 *
 * Every class sets `name` so failures stay recognisable after crossing a
 * logger. Only MalformedDataError is recovered from (by the CLI job); the
 * others abort the computation that raised them.
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class NotRationalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotRationalError";
  }
}

export class DivisionByZeroError extends Error {
  constructor(message: string = "Division by zero") {
    super(message);
    this.name = "DivisionByZeroError";
  }
}

/**
 * A coefficient tensor that does not fit its basis, or a rebase onto a basis
 * missing one of the element's radicands.
 */
export class BasisMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BasisMismatchError";
  }
}

export class DegenerateLineError extends Error {
  constructor(message: string = "Cannot reflect across a line with zero norm") {
    super(message);
    this.name = "DegenerateLineError";
  }
}

export class GraphInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphInvariantError";
  }
}

export class MalformedDataError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source !== undefined ? `${message} (in ${source})` : message);
    this.name = "MalformedDataError";
  }
}
