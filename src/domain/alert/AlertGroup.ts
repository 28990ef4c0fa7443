/**
 * AlertGroup
 *
 * Newly inserted fires of one region within one processing cycle.
 * Built by the change detector, consumed straight away by the notifier,
 * never persisted.
 */

import type { FireRecord } from "../fire/Fire"

export interface AlertGroup {
  region: string
  records: FireRecord[]
  windowStart: Date
  windowEnd: Date
}
