/**
 * Fire Process Service
 *
 * Consumes batches from the delivery channel. Each event runs
 * validate -> fingerprint -> enrich -> store on its own, so one bad event never
 * holds back its siblings:
 *
 *   Received -> Validating -> Enriching -> Persisting -> { Acked, DeadLettered }
 *
 * processBatch() resolves only once every event is persisted or dead-lettered.
 * It rejects when the dead-letter channel itself fails, so the delivery
 * substrate redelivers the whole batch (safe: upserts are idempotent).
 */

import pLimit from "p-limit"
import type {
  EnrichmentResult,
  FireEvent,
  FireRecord,
  LocationEnricher,
  RawFireEvent,
} from "../../domain/fire/Fire"
import type { DeadLetterChannel, FireBatchMessage } from "../../domain/pipeline/Pipeline"
import type { FireStore } from "../fire/FireStore"
import { validateFireEvent } from "../fire/FireValidator"
import { generateFireId, toEpochSeconds } from "../fire/fireFingerprint"
import { ValidationError, toErrorMessage } from "../../shared/errors"

export const MALFORMED_BATCH_REASON = "malformed batch payload"

export type FireOutcome =
  | {
      status: "persisted"
      fireId: string
      inserted: boolean
      enrichment: EnrichmentResult["status"]
    }
  | {
      status: "dead_lettered"
      fireId: string | null
      reason: string
    }

export interface BatchSummary {
  received: number
  inserted: number
  updated: number
  deadLettered: number
  rejected: number
  enrichmentUnavailable: number
}

export interface BatchResult {
  batchId: string | null
  outcomes: FireOutcome[]
  summary: BatchSummary
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function parseFireBatchMessage(body: string): FireBatchMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    throw new ValidationError(MALFORMED_BATCH_REASON, "body")
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.fires)) {
    throw new ValidationError(MALFORMED_BATCH_REASON, "fires")
  }

  const fires: RawFireEvent[] = parsed.fires
  return {
    fires,
    batch_id: typeof parsed.batch_id === "string" ? parsed.batch_id : "unknown",
    timestamp: typeof parsed.timestamp === "string" ? parsed.timestamp : "",
  }
}

export function buildFireRecord(
  fireEvent: FireEvent,
  enrichment: EnrichmentResult,
  now: Date
): FireRecord {
  const location = enrichment.status === "resolved" ? enrichment.location : null

  return {
    ...fireEvent,
    fireId: generateFireId(fireEvent),
    timestamp: toEpochSeconds(fireEvent.acqDate, fireEvent.acqTime),
    locationCity: location?.city ?? null,
    locationLocality: location?.locality ?? null,
    locationState: location?.state ?? null,
    locationCountry: location?.country ?? null,
    createdAt: now,
    updatedAt: now,
  }
}

function summarize(outcomes: FireOutcome[]): BatchSummary {
  const summary: BatchSummary = {
    received: outcomes.length,
    inserted: 0,
    updated: 0,
    deadLettered: 0,
    rejected: 0,
    enrichmentUnavailable: 0,
  }

  for (const outcome of outcomes) {
    if (outcome.status === "persisted") {
      if (outcome.inserted) {
        summary.inserted++
      } else {
        summary.updated++
      }
      if (outcome.enrichment === "unavailable") {
        summary.enrichmentUnavailable++
      }
    } else {
      summary.deadLettered++
      if (outcome.fireId === null) {
        summary.rejected++
      }
    }
  }

  return summary
}

export class FireProcessService {
  constructor(
    private fireStore: FireStore,
    private locationEnricher: LocationEnricher,
    private deadLetterChannel: DeadLetterChannel,
    private concurrency: number = 5,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Entry point for one delivery-channel message. A body that is not a batch
   * is dead-lettered whole.
   */
  async processMessageBody(body: string): Promise<BatchResult> {
    let message: FireBatchMessage
    try {
      message = parseFireBatchMessage(body)
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error
      }
      await this.deadLetter(body, error.message, null)
      return {
        batchId: null,
        outcomes: [{ status: "dead_lettered", fireId: null, reason: error.message }],
        summary: {
          received: 1,
          inserted: 0,
          updated: 0,
          deadLettered: 1,
          rejected: 1,
          enrichmentUnavailable: 0,
        },
      }
    }

    return this.processBatch(message)
  }

  async processBatch(message: FireBatchMessage): Promise<BatchResult> {
    const startTime = Date.now()
    console.log(`[FireProcess] Processing ${message.batch_id} with ${message.fires.length} fires`)

    const limit = pLimit(this.concurrency)
    const settled = await Promise.allSettled(
      message.fires.map((fire) => limit(() => this.processEvent(fire, message.batch_id)))
    )

    const outcomes: FireOutcome[] = []
    for (const result of settled) {
      if (result.status === "rejected") {
        // Only a failing dead-letter channel gets here
        throw result.reason
      }
      outcomes.push(result.value)
    }

    const summary = summarize(outcomes)
    console.log(
      `[FireProcess] ${message.batch_id} complete: ${summary.inserted} inserted, ${summary.updated} updated, ` +
      `${summary.deadLettered} dead-lettered (${summary.rejected} rejected), ` +
      `${summary.enrichmentUnavailable} without location in ${Date.now() - startTime}ms`
    )

    return { batchId: message.batch_id, outcomes, summary }
  }

  async processEvent(raw: RawFireEvent, batchId: string | null): Promise<FireOutcome> {
    const validation = validateFireEvent(raw)
    if (!validation.ok) {
      const reason = validation.error.message
      console.warn(`[FireProcess] ⚠️ Rejected fire in ${batchId ?? "unknown batch"}: ${reason}`)
      await this.deadLetter(raw, reason, batchId)
      return { status: "dead_lettered", fireId: null, reason }
    }

    const fireEvent = validation.value
    const enrichment = await this.enrich(fireEvent)
    const record = buildFireRecord(fireEvent, enrichment, this.clock())

    try {
      const { inserted } = await this.fireStore.upsert(record)
      console.log(
        `[FireProcess] ${inserted ? "✅ Stored" : "ℹ️ Already stored"}: ${record.fireId} ` +
        `(${record.locationCity ?? "Unknown"}, ${record.locationState ?? "Unknown"})`
      )
      return {
        status: "persisted",
        fireId: record.fireId,
        inserted,
        enrichment: enrichment.status,
      }
    } catch (error) {
      const reason = `store write failed: ${toErrorMessage(error)}`
      console.error(`[FireProcess] ❌ ${record.fireId}: ${reason}`)
      await this.deadLetter(raw, reason, batchId)
      return { status: "dead_lettered", fireId: record.fireId, reason }
    }
  }

  private async enrich(fireEvent: FireEvent): Promise<EnrichmentResult> {
    try {
      return await this.locationEnricher.enrich(fireEvent.latitude, fireEvent.longitude)
    } catch (error) {
      return { status: "unavailable", reason: toErrorMessage(error) }
    }
  }

  private async deadLetter(payload: unknown, reason: string, batchId: string | null): Promise<void> {
    await this.deadLetterChannel.send({
      payload,
      reason,
      batchId,
      failedAt: this.clock().toISOString(),
    })
  }
}
