/**
 * Location Backfill Service
 *
 * Re-enriches records stored without a location (indexed under the UNKNOWN
 * region) and upserts those that now resolve. The rows already exist, so the
 * upserts report inserted=false and raise no alert.
 */

import pLimit from "p-limit"
import type {
  FireRecord,
  FireRecordPage,
  FireRecordRepository,
  LocationEnricher,
} from "../../domain/fire/Fire"
import { UNKNOWN_REGION } from "../../domain/fire/Fire"
import type { FireStore } from "../fire/FireStore"
import type { TimeWindow } from "../../shared/types"
import { toErrorMessage } from "../../shared/errors"

export interface BackfillSummary {
  scanned: number
  backfilled: number
  stillUnavailable: number
  failed: number
  duration: number
}

export class LocationBackfillService {
  constructor(
    private fireRecordRepository: FireRecordRepository,
    private fireStore: FireStore,
    private locationEnricher: LocationEnricher,
    private concurrency: number = 5
  ) {}

  async backfill(window: TimeWindow): Promise<BackfillSummary> {
    const startTime = Date.now()
    const summary: BackfillSummary = {
      scanned: 0,
      backfilled: 0,
      stillUnavailable: 0,
      failed: 0,
      duration: 0,
    }

    const range = {
      from: Math.floor(window.start.getTime() / 1000),
      to: Math.floor(window.end.getTime() / 1000),
    }

    const limit = pLimit(this.concurrency)
    let cursor: string | null = null
    do {
      const page: FireRecordPage = await this.fireRecordRepository.findByRegion(UNKNOWN_REGION, range, { cursor })
      summary.scanned += page.items.length

      const results = await Promise.all(page.items.map((record) => limit(() => this.backfillRecord(record))))
      for (const result of results) {
        summary[result]++
      }

      cursor = page.nextCursor
    } while (cursor)

    summary.duration = Date.now() - startTime
    console.log(
      `[LocationBackfill] Completed: ${summary.backfilled}/${summary.scanned} records backfilled ` +
      `(${summary.stillUnavailable} still unavailable, ${summary.failed} failed) in ${summary.duration}ms`
    )

    return summary
  }

  private async backfillRecord(record: FireRecord): Promise<"backfilled" | "stillUnavailable" | "failed"> {
    const enrichment = await this.locationEnricher.enrich(record.latitude, record.longitude)
    if (enrichment.status === "unavailable") {
      return "stillUnavailable"
    }

    const { location } = enrichment
    try {
      await this.fireStore.upsert({
        ...record,
        locationCity: location.city,
        locationLocality: location.locality,
        locationState: location.state,
        locationCountry: location.country,
      })
      return "backfilled"
    } catch (error) {
      console.error(`[LocationBackfill] Error updating ${record.fireId}: ${toErrorMessage(error)}`)
      return "failed"
    }
  }
}
