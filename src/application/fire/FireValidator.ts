/**
 * Fire Event Validator
 *
 * Normalizes a raw feed record into a FireEvent or rejects it with a
 * ValidationError. Rejections are terminal for that event.
 */

import type { DayNight, FireConfidence, FireEvent } from "../../domain/fire/Fire"
import { ValidationError } from "../../shared/errors"
import { err, ok } from "../../shared/types"
import type { Result } from "../../shared/types"

const CONFIDENCE_ALIASES: Record<string, FireConfidence> = {
  low: "low",
  l: "low",
  nominal: "nominal",
  n: "nominal",
  high: "high",
  h: "high",
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^\d{1,4}$/

function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null
  }

  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim())
    return Number.isFinite(parsed) ? parsed : null
  }

  return null
}

function toText(value: unknown): string {
  if (typeof value === "string") {
    return value.trim()
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value)
  }
  return ""
}

export function normalizeAcqDate(value: unknown): string | null {
  const text = toText(value)
  const match = DATE_PATTERN.exec(text)
  if (!match) {
    return null
  }

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const date = new Date(Date.UTC(year, month - 1, day))

  // Rejects 2024-02-30 and friends, which Date would silently roll over
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null
  }

  return text
}

export function normalizeAcqTime(value: unknown): string | null {
  const text = toText(value)
  if (!TIME_PATTERN.test(text)) {
    return null
  }

  const padded = text.padStart(4, "0")
  const hours = Number(padded.slice(0, 2))
  const minutes = Number(padded.slice(2))
  if (hours > 23 || minutes > 59) {
    return null
  }

  return padded
}

function normalizeConfidence(value: unknown): FireConfidence | null {
  return CONFIDENCE_ALIASES[toText(value).toLowerCase()] ?? null
}

function normalizeDayNight(value: unknown): DayNight | null {
  const text = toText(value).toUpperCase()
  return text === "D" || text === "N" ? text : null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function reject(reason: string, field: string): Result<never, ValidationError> {
  return err(new ValidationError(reason, field))
}

export function validateFireEvent(raw: unknown): Result<FireEvent, ValidationError> {
  if (!isRecord(raw)) {
    return reject("fire event is not an object", "fire")
  }

  const latitude = toNumber(raw.latitude)
  if (latitude === null) {
    return reject("latitude is not a number", "latitude")
  }
  if (latitude < -90 || latitude > 90) {
    return reject("latitude out of range", "latitude")
  }

  const longitude = toNumber(raw.longitude)
  if (longitude === null) {
    return reject("longitude is not a number", "longitude")
  }
  if (longitude < -180 || longitude > 180) {
    return reject("longitude out of range", "longitude")
  }

  const acqDate = normalizeAcqDate(raw.acq_date)
  if (acqDate === null) {
    return reject("acquisition date is invalid", "acq_date")
  }

  const acqTime = normalizeAcqTime(raw.acq_time)
  if (acqTime === null) {
    return reject("acquisition time is invalid", "acq_time")
  }

  const confidence = normalizeConfidence(raw.confidence)
  if (confidence === null) {
    return reject("confidence not recognized", "confidence")
  }

  const brightness = toNumber(raw.brightness)
  if (brightness === null) {
    return reject("brightness is not a number", "brightness")
  }

  const frp = toNumber(raw.frp)
  if (frp === null) {
    return reject("fire radiative power is not a number", "frp")
  }
  if (frp < 0) {
    return reject("fire radiative power out of range", "frp")
  }

  const dayNight = normalizeDayNight(raw.daynight)
  if (dayNight === null) {
    return reject("day/night flag not recognized", "daynight")
  }

  return ok({
    latitude,
    longitude,
    brightness,
    confidence,
    frp,
    acqDate,
    acqTime,
    satellite: toText(raw.satellite),
    instrument: toText(raw.instrument),
    dayNight,
  })
}
