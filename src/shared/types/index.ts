/**
 * Shared Types
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * Closed time interval in Unix epoch seconds
 */
export interface TimeRange {
  from: number
  to: number
}

export interface TimeWindow {
  start: Date
  end: Date
}

export function trailingWindow(hours: number, now: Date = new Date()): TimeWindow {
  return {
    start: new Date(now.getTime() - hours * 60 * 60 * 1000),
    end: now,
  }
}
