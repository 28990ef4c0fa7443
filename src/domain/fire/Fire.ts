/**
 * Fire Domain Entity
 *
 * A fire detection from the FIRMS active-fire feed, from its untrusted wire
 * form (RawFireEvent) through validation (FireEvent) to the persisted,
 * fingerprinted and reverse-geocoded FireRecord.
 *
 * Records are keyed by fire_id and never deleted by the pipeline.
 */

import type { TimeRange } from "../../shared/types"

export type FireConfidence = "low" | "nominal" | "high"
export type DayNight = "D" | "N"

/**
 * Region used when a record carries no country
 */
export const UNKNOWN_REGION = "UNKNOWN"

/**
 * One element of a batch message's `fires` array, as the feed published it.
 * Values are untrusted until validated.
 */
export interface RawFireEvent {
  latitude?: unknown
  longitude?: unknown
  brightness?: unknown
  confidence?: unknown
  frp?: unknown
  acq_date?: unknown
  acq_time?: unknown
  satellite?: unknown
  instrument?: unknown
  daynight?: unknown
}

export interface FireEvent {
  latitude: number
  longitude: number
  brightness: number
  confidence: FireConfidence
  frp: number
  acqDate: string // YYYY-MM-DD
  acqTime: string // HHMM, UTC
  satellite: string
  instrument: string
  dayNight: DayNight
}

export interface LocationInfo {
  city: string | null
  locality: string | null
  state: string | null
  country: string | null
}

export interface FireRecord extends FireEvent {
  fireId: string
  // Epoch seconds of acqDate + acqTime
  timestamp: number
  locationCity: string | null
  locationLocality: string | null
  locationState: string | null
  locationCountry: string | null
  createdAt: Date
  updatedAt: Date
}

export interface UpsertResult {
  record: FireRecord
  inserted: boolean
}

/**
 * Emitted once per upsert call, whatever its outcome
 */
export interface FireMutationEvent {
  record: FireRecord
  inserted: boolean
}

export type FireMutationListener = (event: FireMutationEvent) => void

export interface RegionQueryOptions {
  limit?: number
  cursor?: string | null
}

export interface FireRecordPage {
  items: FireRecord[]
  nextCursor: string | null
}

export interface FireRecordRepository {
  /**
   * Atomic per fireId: inserts when absent, otherwise merges enrichment
   * fields the incoming record carries and keeps createdAt.
   */
  upsert(record: FireRecord): Promise<UpsertResult>
  findById(fireId: string): Promise<FireRecord | null>
  findByRegion(region: string, range: TimeRange, options?: RegionQueryOptions): Promise<FireRecordPage>
}

export type EnrichmentResult =
  | { status: "resolved"; location: LocationInfo }
  | { status: "unavailable"; reason: string }

export interface LocationEnricher {
  enrich(latitude: number, longitude: number): Promise<EnrichmentResult>
}

export function regionOf(record: Pick<FireRecord, "locationCountry">): string {
  const country = record.locationCountry?.trim()
  return country ? country : UNKNOWN_REGION
}
