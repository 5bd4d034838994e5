/**
 * Raised whenever a codec path cannot convert between bytes and the requested
 * type. The message is the underlying codec's own description, unmodified.
 */
export class CoercionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CoercionError';
  }
}

export function toCoercionError(err: unknown): CoercionError {
  if (err instanceof CoercionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CoercionError(message, { cause: err });
}
