/**
 * ExtractionInputError — caller handed the extractor something that is not text
 *
 * Parsing problems never raise; this error is reserved for contract
 * violations that indicate a bug in the caller.
 */
export class ExtractionInputError extends Error {
  /** Runtime type of the rejected value (e.g. "number", "null", "array") */
  public readonly receivedType: string;

  constructor(message: string, received: unknown) {
    const receivedType = describeType(received);
    super(`${message} (received ${receivedType})`);
    this.name = "ExtractionInputError";
    this.receivedType = receivedType;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExtractionInputError);
    }
  }
}

function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}
