/**
 * Minimal success/failure union used where callers must tell
 * "the call returned nothing" apart from "the call failed".
 */
export type Result<T, E extends Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E extends Error>(error: E): { ok: false; error: E } => ({ ok: false, error });
