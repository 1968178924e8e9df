/**
 * Outcome of an operation that fails in expected ways.
 *
 * Lower layers (token codec, session manager) return these instead of
 * throwing; only the HTTP-facing layers turn failures into exceptions.
 */
export type Result<TValue, TError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): Result<TValue, never> => ({
  ok: true as const,
  value,
});

export const err = <TError>(error: TError): Result<never, TError> => ({
  ok: false as const,
  error,
});
