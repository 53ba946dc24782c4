import type { MetaguardError } from "./domain-error.js";

export type Result<TValue, TError extends MetaguardError = MetaguardError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): Result<TValue> => ({ ok: true as const, value });

export const err = <TError extends MetaguardError>(error: TError): Result<never, TError> => ({
  ok: false as const,
  error,
});
