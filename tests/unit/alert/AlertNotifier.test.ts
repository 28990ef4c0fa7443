/**
 * AlertNotifier Unit Tests
 */

import {
  AlertNotifier,
  formatAlert,
  formatPlace,
  formatUtc,
} from "../../../src/application/alert/AlertNotifier"
import type { AlertGroup } from "../../../src/domain/alert/AlertGroup"
import type { AlertPublisher } from "../../../src/domain/pipeline/Pipeline"
import { NotifyError } from "../../../src/shared/errors"
import { fireRecord } from "../../fakes/fixtures"

const CREATED_AT = new Date("2024-07-01T12:45:00.000Z")

function group(region: string, count: number): AlertGroup {
  const records = Array.from({ length: count }, (_, index) =>
    fireRecord({
      fireId: `fire-${index}`,
      latitude: 40 + index,
      longitude: -120,
      timestamp: 1719837000 + index * 60,
      locationCountry: region,
    })
  )
  return { region, records, windowStart: CREATED_AT, windowEnd: CREATED_AT }
}

describe("formatAlert", () => {
  it("should summarize a single fire", () => {
    const alert = formatAlert(group("USA", 1))

    expect(alert.subject).toBe("Fire Alert: 1 new fire(s) in USA")
    expect(alert.message).toBe(
      [
        "1 new active fire(s) detected in USA.",
        "",
        "Detected: 2024-07-01 12:30 UTC",
        "",
        "  • San Francisco, California (40.0000, -120.0000)",
        "    Confidence: high, FRP: 12.3 MW",
      ].join("\n")
    )
    expect(alert.attributes).toEqual({ fireCount: 1, region: "USA" })
  })

  it("should list five fires and count the rest", () => {
    const alert = formatAlert(group("France", 7))
    const lines = alert.message.split("\n")

    expect(lines[2]).toBe("Detected between 2024-07-01 12:30 UTC and 2024-07-01 12:36 UTC")
    expect(lines.filter((line) => line.startsWith("  • "))).toHaveLength(5)
    expect(lines[lines.length - 1]).toBe("  ... and 2 more")
    expect(alert.attributes.fireCount).toBe(7)
  })

  it("should keep the subject ASCII", () => {
    const alert = formatAlert(group("Côte d'Ivoire", 2))

    expect(alert.subject).toBe("Fire Alert: 2 new fire(s) in C?te d'Ivoire")
  })
})

describe("formatPlace", () => {
  it("should fall back to locality, then to Unknown location", () => {
    expect(formatPlace(fireRecord({ locationCity: null, locationLocality: "Outback", locationState: null }))).toBe(
      "Outback"
    )
    expect(
      formatPlace(fireRecord({ locationCity: null, locationLocality: null, locationState: null }))
    ).toBe("Unknown location")
  })
})

describe("formatUtc", () => {
  it("should print minutes in UTC", () => {
    expect(formatUtc(0)).toBe("1970-01-01 00:00 UTC")
  })
})

describe("AlertNotifier", () => {
  let mockPublisher: jest.Mocked<AlertPublisher>
  let notifier: AlertNotifier

  beforeEach(() => {
    mockPublisher = { publish: jest.fn() }
    notifier = new AlertNotifier(mockPublisher)
  })

  it("should publish the formatted alert", async () => {
    mockPublisher.publish.mockResolvedValue("msg-1")

    const result = await notifier.notify(group("USA", 2))

    expect(result.ok).toBe(true)
    expect(mockPublisher.publish).toHaveBeenCalledWith(formatAlert(group("USA", 2)))
  })

  it("should return a NotifyError when publishing fails", async () => {
    mockPublisher.publish.mockRejectedValue(new Error("Topic does not exist"))

    const result = await notifier.notify(group("USA", 1))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotifyError)
      expect(result.error.message).toBe("Failed to publish alert for USA: Topic does not exist")
      expect(result.error.region).toBe("USA")
    }
  })
})
