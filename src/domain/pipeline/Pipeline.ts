/**
 * Pipeline channel contracts
 *
 * The delivery channel (fetch -> process), the dead-letter channel and the
 * alert fan-out sink. Transports are at-least-once; consumers rely on
 * idempotent upserts.
 */

import type { RawFireEvent } from "../fire/Fire"

export interface FireBatchMessage {
  fires: RawFireEvent[]
  batch_id: string
  timestamp: string
}

export interface FireBatchChannel {
  send(message: FireBatchMessage): Promise<string | null>
}

export interface DeadLetterEntry {
  payload: unknown
  reason: string
  batchId: string | null
  failedAt: string
}

export interface DeadLetterChannel {
  send(entry: DeadLetterEntry): Promise<void>
}

export interface AlertMessage {
  subject: string
  message: string
  attributes: {
    fireCount: number
    region: string
  }
}

export interface AlertPublisher {
  publish(alert: AlertMessage): Promise<string | null>
}

export interface SecretSource {
  getSecretJson(secretName: string): Promise<Record<string, string> | null>
}
