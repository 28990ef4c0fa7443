/**
 * withRetry Unit Tests
 */

import { TransientEnrichmentError } from "../../../src/shared/errors"
import { backoffDelay, withRetry } from "../../../src/shared/utils/retry"
import { lazyAsync } from "../../../src/shared/utils/lazy"

describe("withRetry", () => {
  it("should pass the attempt number and report each retry", async () => {
    const onRetry = jest.fn()
    const operation = jest.fn(async (attemptNumber: number) => {
      if (attemptNumber < 3) {
        throw new TransientEnrichmentError("rate limited", 429)
      }
      return "done"
    })

    await expect(withRetry(operation, { maxAttempts: 3, baseDelayMs: 0, onRetry })).resolves.toBe("done")
    expect(onRetry).toHaveBeenCalledTimes(2)
    expect(onRetry.mock.calls.map(([, attemptNumber]) => attemptNumber)).toEqual([1, 2])
  })

  it("should rethrow non-retryable errors at once", async () => {
    const operation = jest.fn(async () => {
      throw new Error("bad request")
    })

    await expect(withRetry(operation, { maxAttempts: 5, baseDelayMs: 0 })).rejects.toThrow("bad request")
    expect(operation).toHaveBeenCalledTimes(1)
  })
})

describe("backoffDelay", () => {
  it("should double per attempt", () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(500, attempt))).toEqual([500, 1000, 2000])
  })
})

describe("lazyAsync", () => {
  it("should build once and retry after a failed build", async () => {
    const factory = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error("secret unavailable"))
      .mockResolvedValue("service")
    const getService = lazyAsync(factory)

    await expect(getService()).rejects.toThrow("secret unavailable")
    await expect(getService()).resolves.toBe("service")
    await expect(getService()).resolves.toBe("service")
    expect(factory).toHaveBeenCalledTimes(2)
  })
})
