/**
 * In-memory FireRecordRepository for service tests
 *
 * Mirrors the DynamoDB merge: enrichment fields take the incoming value when
 * it is non-null, createdAt always stays.
 */

import type {
  FireRecord,
  FireRecordPage,
  FireRecordRepository,
  RegionQueryOptions,
  UpsertResult,
} from "../../src/domain/fire/Fire"
import { regionOf } from "../../src/domain/fire/Fire"
import type { TimeRange } from "../../src/shared/types"

function mergeFireRecord(existing: FireRecord, incoming: FireRecord): FireRecord {
  return {
    ...existing,
    locationCity: incoming.locationCity ?? existing.locationCity,
    locationLocality: incoming.locationLocality ?? existing.locationLocality,
    locationState: incoming.locationState ?? existing.locationState,
    locationCountry: incoming.locationCountry ?? existing.locationCountry,
    updatedAt: incoming.updatedAt,
  }
}

export class InMemoryFireRecordRepository implements FireRecordRepository {
  readonly records = new Map<string, FireRecord>()
  upsertCalls = 0

  async upsert(record: FireRecord): Promise<UpsertResult> {
    this.upsertCalls++
    const existing = this.records.get(record.fireId)
    if (!existing) {
      this.records.set(record.fireId, record)
      return { record, inserted: true }
    }

    const merged = mergeFireRecord(existing, record)
    this.records.set(record.fireId, merged)
    return { record: merged, inserted: false }
  }

  async findById(fireId: string): Promise<FireRecord | null> {
    return this.records.get(fireId) ?? null
  }

  async findByRegion(
    region: string,
    range: TimeRange,
    options: RegionQueryOptions = {}
  ): Promise<FireRecordPage> {
    const matching = [...this.records.values()]
      .filter((record) => regionOf(record) === region)
      .filter((record) => record.timestamp >= range.from && record.timestamp <= range.to)
      .sort((a, b) => a.timestamp - b.timestamp)

    const offset = options.cursor ? Number(options.cursor) : 0
    const limit = options.limit ?? 100
    const items = matching.slice(offset, offset + limit)
    const next = offset + limit

    return {
      items,
      nextCursor: next < matching.length ? String(next) : null,
    }
  }
}
