/**
 * Fire fingerprint (fire_id)
 *
 * Two detections with the same rounded coordinates and the same acquisition
 * date and time are the same fire. Four decimals is roughly 11 m at the
 * equator: well under a VIIRS pixel, coarse enough to absorb float jitter
 * between polls.
 */

import type { FireEvent } from "../../domain/fire/Fire"

export const FINGERPRINT_PRECISION = 4

function roundCoordinate(value: number): string {
  const fixed = value.toFixed(FINGERPRINT_PRECISION)
  // -0.00001 rounds to "-0.0000"
  return Number(fixed) === 0 ? (0).toFixed(FINGERPRINT_PRECISION) : fixed
}

export function generateFireId(
  event: Pick<FireEvent, "latitude" | "longitude" | "acqDate" | "acqTime">
): string {
  return [
    roundCoordinate(event.latitude),
    roundCoordinate(event.longitude),
    event.acqDate,
    event.acqTime,
  ].join("_")
}

/**
 * acqDate (YYYY-MM-DD) + acqTime (HHMM, UTC) as Unix epoch seconds
 */
export function toEpochSeconds(acqDate: string, acqTime: string): number {
  const [year, month, day] = acqDate.split("-").map(Number)
  const hours = Number(acqTime.slice(0, 2))
  const minutes = Number(acqTime.slice(2, 4))
  return Math.floor(Date.UTC(year, month - 1, day, hours, minutes) / 1000)
}
