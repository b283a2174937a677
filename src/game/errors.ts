/** A caller broke a precondition: bad configuration, zero direction, negative count. */
export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

export class TapeFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TapeFormatError";
  }
}
