/**
 * Result Pattern
 * Discriminated union returned across the cluster fetch boundary, where
 * failures are expected and must not abort sibling namespaces
 */

export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

export const Success = <T, E = never>(value: T): Result<T, E> => ({ ok: true, value });

export const Failure = <T = never, E = string>(error: E): Result<T, E> => ({ ok: false, error });

export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } => result.ok;

export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;
