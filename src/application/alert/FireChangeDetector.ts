/**
 * Fire Change Detector
 *
 * Turns one cycle of store mutation events into one AlertGroup per region.
 * A cycle is one invocation; nothing is carried into the next one, so a fire
 * inserted now never shows up in a later cycle's group. Updates
 * (inserted=false, e.g. a redelivered batch) are ignored.
 */

import type { AlertGroup } from "../../domain/alert/AlertGroup"
import type { FireMutationEvent } from "../../domain/fire/Fire"
import { regionOf } from "../../domain/fire/Fire"
import type { FireStore } from "../fire/FireStore"

export interface CycleRecorder {
  close(): AlertGroup[]
}

export class FireChangeDetector {
  detect(events: FireMutationEvent[]): AlertGroup[] {
    const groups = new Map<string, AlertGroup>()

    for (const event of events) {
      if (!event.inserted) {
        continue
      }

      const { record } = event
      const region = regionOf(record)
      const group = groups.get(region)

      if (!group) {
        groups.set(region, {
          region,
          records: [record],
          windowStart: record.createdAt,
          windowEnd: record.createdAt,
        })
        continue
      }

      group.records.push(record)
      if (record.createdAt < group.windowStart) {
        group.windowStart = record.createdAt
      }
      if (record.createdAt > group.windowEnd) {
        group.windowEnd = record.createdAt
      }
    }

    return [...groups.values()].sort((a, b) => a.region.localeCompare(b.region))
  }

  /**
   * Buffers the store's mutation events from now until close(), then groups
   * them as one cycle.
   */
  observe(fireStore: FireStore): CycleRecorder {
    const events: FireMutationEvent[] = []
    const unsubscribe = fireStore.subscribe((event) => {
      events.push(event)
    })

    return {
      close: () => {
        unsubscribe()
        return this.detect(events)
      },
    }
  }
}
