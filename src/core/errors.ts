/**
 * Error Handling: Custom error types for decoding, structure and rendering failures
 */

/**
 * The input bytes or document could not be decoded into a dataset.
 * No walk is performed when this is raised.
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly offset?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * Create a decode error with context
 */
export function createDecodeError(
  message: string,
  source?: string,
  offset?: number,
  cause?: Error
): DecodeError {
  let fullMessage = message;
  if (source) {
    fullMessage += ` (source: ${source})`;
  }
  if (offset !== undefined) {
    fullMessage += ` (offset: ${offset})`;
  }
  return new DecodeError(fullMessage, source, offset, cause);
}

/**
 * The input is not a well-formed dataset tree, or it nests deeper than allowed.
 */
export class StructuralError extends Error {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'StructuralError';
  }
}

/**
 * Create a structural error that points at the offending node
 */
export function createStructuralError(message: string, path?: string): StructuralError {
  const fullMessage = path ? `${message} (at: ${path})` : message;
  return new StructuralError(fullMessage, path);
}

/**
 * A single element's value could not be turned into text.
 * The walker recovers from it and keeps going.
 */
export class RenderError extends Error {
  constructor(
    message: string,
    public readonly tag?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RenderError';
  }
}

export class OptionsError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'OptionsError';
  }
}

/**
 * Normalize anything thrown by third-party code into an Error.
 * Some decoders throw plain strings or `{ exception }` objects.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  if (typeof thrown === 'string') {
    return new Error(thrown);
  }
  if (typeof thrown === 'object' && thrown !== null && 'exception' in thrown) {
    return toError(thrown.exception);
  }
  return new Error(String(thrown));
}
