/**
 * Fire Store
 *
 * Idempotent upsert over the FireRecordRepository. Retries transient storage
 * errors and emits one FireMutationEvent per upsert call to its subscribers,
 * inserted or not. Only the repository writes createdAt.
 */

import type {
  FireMutationListener,
  FireRecord,
  FireRecordRepository,
  UpsertResult,
} from "../../domain/fire/Fire"
import { toErrorMessage } from "../../shared/errors"
import { withRetry } from "../../shared/utils/retry"

export interface FireStoreOptions {
  maxAttempts?: number
  retryBaseDelayMs?: number
}

export class FireStore {
  private readonly listeners = new Set<FireMutationListener>()
  private readonly maxAttempts: number
  private readonly retryBaseDelayMs: number

  constructor(
    private fireRecordRepository: FireRecordRepository,
    options: FireStoreOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 3
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 200
  }

  subscribe(listener: FireMutationListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  async upsert(record: FireRecord): Promise<UpsertResult> {
    const result = await withRetry(
      () => this.fireRecordRepository.upsert(record),
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        onRetry: (error, attemptNumber, delayMs) => {
          console.warn(
            `[FireStore] ⚠️ Transient error writing ${record.fireId} (attempt ${attemptNumber}/${this.maxAttempts}), ` +
            `retrying in ${delayMs}ms: ${toErrorMessage(error)}`
          )
        },
      }
    )

    this.emit(result)
    return result
  }

  private emit(result: UpsertResult): void {
    for (const listener of this.listeners) {
      try {
        listener({ record: result.record, inserted: result.inserted })
      } catch (error) {
        console.error(`[FireStore] Mutation listener failed for ${result.record.fireId}:`, error)
      }
    }
  }
}
