/**
 * Shared TypeScript types for the AYOSMS client.
 * Module-specific types live in src/lib/modules/<module>/types.ts
 */

/** Successful outcome of an internal step */
export interface Ok<T> {
  ok: true
  value: T
}

/** Failed outcome of an internal step, carrying a gateway error code */
export interface Err {
  ok: false
  code: string
  message: string
}

export type Result<T> = Ok<T> | Err

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err(code: string, message: string): Err {
  return { ok: false, code, message }
}
