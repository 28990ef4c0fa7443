/**
 * FIRMS area CSV parsing
 *
 * Header: latitude,longitude,bright_ti4,scan,track,acq_date,acq_time,satellite,
 * instrument,confidence,version,bright_ti5,frp,daynight (VIIRS). MODIS names the
 * brightness column `brightness`. FIRMS CSV has no quoted fields.
 */

import type { RawFireEvent } from "../../domain/fire/Fire"

const BRIGHTNESS_COLUMNS = ["brightness", "bright_ti4"]

function toNumberOrText(value: string | undefined): number | string | undefined {
  if (value === undefined) {
    return undefined
  }
  const trimmed = value.trim()
  if (trimmed === "") {
    return trimmed
  }
  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : trimmed
}

export function parseFirmsCsv(csv: string): RawFireEvent[] {
  const lines = csv
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

  if (lines.length < 2) {
    return []
  }

  const header = lines[0].split(",").map((column) => column.trim().toLowerCase())
  const fires: RawFireEvent[] = []

  for (const line of lines.slice(1)) {
    const values = line.split(",")
    if (values.length < header.length) {
      continue
    }

    const row = new Map<string, string>()
    header.forEach((column, index) => row.set(column, values[index].trim()))

    const brightnessColumn = BRIGHTNESS_COLUMNS.find((column) => row.has(column))

    fires.push({
      latitude: toNumberOrText(row.get("latitude")),
      longitude: toNumberOrText(row.get("longitude")),
      brightness: toNumberOrText(brightnessColumn ? row.get(brightnessColumn) : undefined),
      confidence: row.get("confidence"),
      frp: toNumberOrText(row.get("frp")),
      acq_date: row.get("acq_date"),
      acq_time: row.get("acq_time"),
      satellite: row.get("satellite"),
      instrument: row.get("instrument"),
      daynight: row.get("daynight"),
    })
  }

  return fires
}
