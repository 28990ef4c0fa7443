/**
 * Fetch Fires Handler Unit Tests
 */

import type { EventBridgeEvent } from "aws-lambda"
import { FireFetchService } from "../../../src/application/sync/FireFetchService"
import type { FireFeed } from "../../../src/application/sync/FireFetchService"
import type { FireBatchChannel } from "../../../src/domain/pipeline/Pipeline"
import { createFetchFiresHandler } from "../../../src/interfaces/events/fetch-fires/fetchFiresHandler"
import { rawFire } from "../../fakes/fixtures"

const NOW = new Date("2024-07-01T15:00:00.000Z")

const scheduledEvent: EventBridgeEvent<"Scheduled Event", unknown> = {
  id: "event-1",
  version: "0",
  account: "000000000000",
  time: NOW.toISOString(),
  region: "us-east-1",
  resources: [],
  source: "aws.events",
  "detail-type": "Scheduled Event",
  detail: {},
}

describe("fetchFiresHandler", () => {
  let mockFeed: jest.Mocked<FireFeed>
  let mockChannel: jest.Mocked<FireBatchChannel>
  let handler: ReturnType<typeof createFetchFiresHandler>

  beforeEach(() => {
    mockFeed = { fetchFires: jest.fn() }
    mockChannel = { send: jest.fn() }
    const fireFetchService = new FireFetchService(mockFeed, mockChannel, 10)
    handler = createFetchFiresHandler(async () => ({ fireFetchService, windowHours: 24 }), () => NOW)
  })

  it("should fetch the trailing window and return the summary", async () => {
    mockFeed.fetchFires.mockResolvedValue([rawFire({ acq_date: "2024-07-01", acq_time: "1200" })])
    mockChannel.send.mockResolvedValue("m-1")

    const summary = await handler(scheduledEvent)

    expect(mockFeed.fetchFires).toHaveBeenCalledWith({
      start: new Date("2024-06-30T15:00:00.000Z"),
      end: NOW,
    })
    expect(summary).toMatchObject({ firesFound: 1, batchesSent: 1, firesQueued: 1 })
  })

  it("should fail the invocation when a batch could not be queued", async () => {
    mockFeed.fetchFires.mockResolvedValue([rawFire({ acq_date: "2024-07-01", acq_time: "1200" })])
    mockChannel.send.mockRejectedValue(new Error("AccessDenied"))

    await expect(handler(scheduledEvent)).rejects.toThrow(
      "1 batches failed to queue. Check logs for details."
    )
  })

  it("should fail the invocation when the feed fails", async () => {
    mockFeed.fetchFires.mockRejectedValue(new Error("FIRMS request failed: HTTP 500 Internal Server Error"))

    await expect(handler(scheduledEvent)).rejects.toThrow("FIRMS request failed")
  })
})
