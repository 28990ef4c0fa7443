/**
 * FireChangeDetector Unit Tests
 */

import { FireStore } from "../../../src/application/fire/FireStore"
import { FireChangeDetector } from "../../../src/application/alert/FireChangeDetector"
import type { FireMutationEvent } from "../../../src/domain/fire/Fire"
import { InMemoryFireRecordRepository } from "../../fakes/InMemoryFireRecordRepository"
import { fireRecord } from "../../fakes/fixtures"

function inserted(fireId: string, country: string | null, createdAt: string): FireMutationEvent {
  return {
    record: fireRecord({ fireId, locationCountry: country, createdAt: new Date(createdAt) }),
    inserted: true,
  }
}

describe("FireChangeDetector", () => {
  const detector = new FireChangeDetector()

  it("should group new fires by country", () => {
    const groups = detector.detect([
      inserted("us-1", "USA", "2024-07-01T12:00:00.000Z"),
      inserted("fr-1", "France", "2024-07-01T12:05:00.000Z"),
      inserted("us-2", "USA", "2024-07-01T12:10:00.000Z"),
    ])

    expect(groups.map((group) => group.region)).toEqual(["France", "USA"])
    expect(groups[1].records.map((record) => record.fireId)).toEqual(["us-1", "us-2"])
    expect(groups[1].windowStart).toEqual(new Date("2024-07-01T12:00:00.000Z"))
    expect(groups[1].windowEnd).toEqual(new Date("2024-07-01T12:10:00.000Z"))
    expect(groups[0].records).toHaveLength(1)
  })

  it("should ignore updates of existing fires", () => {
    const duplicate: FireMutationEvent = {
      record: fireRecord({ fireId: "us-1", locationCountry: "USA" }),
      inserted: false,
    }

    const groups = detector.detect([duplicate])

    expect(groups).toEqual([])
  })

  it("should group fires without a country under UNKNOWN", () => {
    const groups = detector.detect([
      inserted("sea-1", null, "2024-07-01T12:00:00.000Z"),
      inserted("sea-2", "  ", "2024-07-01T12:01:00.000Z"),
    ])

    expect(groups).toHaveLength(1)
    expect(groups[0].region).toBe("UNKNOWN")
    expect(groups[0].records).toHaveLength(2)
  })

  it("should return nothing for an empty cycle", () => {
    expect(detector.detect([])).toEqual([])
  })

  describe("observe", () => {
    it("should group the inserts a store made while observed", async () => {
      const fireStore = new FireStore(new InMemoryFireRecordRepository(), { retryBaseDelayMs: 0 })
      await fireStore.upsert(fireRecord({ fireId: "before", locationCountry: "Spain" }))

      const recorder = detector.observe(fireStore)
      await fireStore.upsert(fireRecord({ fireId: "a", locationCountry: "Spain" }))
      await fireStore.upsert(fireRecord({ fireId: "before", locationCountry: "Spain" }))
      const groups = recorder.close()

      await fireStore.upsert(fireRecord({ fireId: "after", locationCountry: "Spain" }))

      expect(groups).toHaveLength(1)
      expect(groups[0].records.map((record) => record.fireId)).toEqual(["a"])
    })
  })
})
