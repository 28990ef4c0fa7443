/**
 * Fire Fetch Service
 *
 * Pulls the trailing window from the fire feed and hands it to the delivery
 * channel in fixed-size batches. Invoked by an external schedule; holds no
 * timer of its own.
 */

import type { RawFireEvent } from "../../domain/fire/Fire"
import type { FireBatchChannel, FireBatchMessage } from "../../domain/pipeline/Pipeline"
import { normalizeAcqDate, normalizeAcqTime } from "../fire/FireValidator"
import { toEpochSeconds } from "../fire/fireFingerprint"
import { toErrorMessage } from "../../shared/errors"
import type { TimeWindow } from "../../shared/types"

export const DEFAULT_BATCH_SIZE = 10

export interface FireFeed {
  fetchFires(window: TimeWindow): Promise<RawFireEvent[]>
}

export interface FetchSummary {
  firesFound: number
  batchesSent: number
  batchesFailed: number
  firesQueued: number
  duration: number
}

export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size))
  }
  return batches
}

/**
 * Rows whose acquisition time cannot be read are kept so that validation
 * dead-letters them instead of them vanishing here.
 */
function isInsideWindow(fire: RawFireEvent, window: TimeWindow): boolean {
  const acqDate = normalizeAcqDate(fire.acq_date)
  const acqTime = normalizeAcqTime(fire.acq_time)
  if (acqDate === null || acqTime === null) {
    return true
  }

  const acquiredAtMs = toEpochSeconds(acqDate, acqTime) * 1000
  return acquiredAtMs >= window.start.getTime() && acquiredAtMs <= window.end.getTime()
}

export class FireFetchService {
  constructor(
    private fireFeed: FireFeed,
    private fireBatchChannel: FireBatchChannel,
    private batchSize: number = DEFAULT_BATCH_SIZE
  ) {}

  async fetch(window: TimeWindow): Promise<RawFireEvent[]> {
    const fires = await this.fireFeed.fetchFires(window)
    return fires.filter((fire) => isInsideWindow(fire, window))
  }

  async run(window: TimeWindow, now: Date = new Date()): Promise<FetchSummary> {
    const startTime = Date.now()
    const fires = await this.fetch(window)

    const summary: FetchSummary = {
      firesFound: fires.length,
      batchesSent: 0,
      batchesFailed: 0,
      firesQueued: 0,
      duration: 0,
    }

    if (fires.length === 0) {
      console.log("[FireFetch] ℹ️ No active fires detected in the window")
      summary.duration = Date.now() - startTime
      return summary
    }

    const batches = chunk(fires, this.batchSize)

    for (const [index, batch] of batches.entries()) {
      const message: FireBatchMessage = {
        fires: batch,
        batch_id: `batch_${index}`,
        timestamp: now.toISOString(),
      }

      try {
        const messageId = await this.fireBatchChannel.send(message)
        summary.batchesSent++
        summary.firesQueued += batch.length
        console.log(`[FireFetch] Sent ${message.batch_id}: ${batch.length} fires (MessageId: ${messageId ?? "n/a"})`)
      } catch (error) {
        summary.batchesFailed++
        console.error(`[FireFetch] Error sending ${message.batch_id}: ${toErrorMessage(error)}`)
      }
    }

    summary.duration = Date.now() - startTime
    console.log(
      `[FireFetch] Completed: ${summary.firesQueued}/${summary.firesFound} fires queued in ` +
      `${summary.batchesSent} batches (${summary.batchesFailed} failed) in ${summary.duration}ms`
    )

    return summary
  }
}
