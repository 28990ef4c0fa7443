/**
 * BigDataCloud Reverse Geocoder
 *
 * LocationEnricher backed by the reverse-geocode-client endpoint. Works
 * without an API key at a reduced quota.
 *
 * Each attempt has its own timeout, body read included. Network errors,
 * timeouts, 408, 429 and 5xx are retried with exponential backoff; anything
 * else, or running out of attempts, resolves to "unavailable". enrich() never rejects: a missing
 * location must not keep a detection out of the store.
 */

import type { EnrichmentResult, LocationEnricher, LocationInfo } from "../../domain/fire/Fire"
import { TransientEnrichmentError, toErrorMessage } from "../../shared/errors"
import { withRetry } from "../../shared/utils/retry"
import { fetchWithTimeout, shouldRetryHttpStatus } from "../http/httpClient"
import type { FetchFn } from "../http/httpClient"

export const BIGDATACLOUD_REVERSE_GEOCODE_URL =
  "https://api.bigdatacloud.net/data/reverse-geocode-client"

interface BigDataCloudReverseGeocodeResponse {
  city?: string
  locality?: string
  principalSubdivision?: string
  countryName?: string
}

export interface BigDataCloudGeocoderOptions {
  apiKey?: string | null
  baseUrl?: string
  requestTimeoutMs?: number
  maxAttempts?: number
  retryBaseDelayMs?: number
  fetchFn?: FetchFn
}

class PermanentEnrichmentFailure extends Error {}

function blankToNull(value: unknown): string | null {
  if (typeof value !== "string") {
    return null
  }
  const trimmed = value.trim()
  return trimmed ? trimmed : null
}

function isObject(value: unknown): value is BigDataCloudReverseGeocodeResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class BigDataCloudGeocoder implements LocationEnricher {
  private readonly apiKey: string | null
  private readonly baseUrl: string
  private readonly requestTimeoutMs: number
  private readonly maxAttempts: number
  private readonly retryBaseDelayMs: number
  private readonly fetchFn: FetchFn

  constructor(options: BigDataCloudGeocoderOptions = {}) {
    this.apiKey = options.apiKey?.trim() || null
    this.baseUrl = options.baseUrl ?? BIGDATACLOUD_REVERSE_GEOCODE_URL
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000
    this.maxAttempts = options.maxAttempts ?? 3
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500
    this.fetchFn = options.fetchFn ?? fetch
  }

  buildUrl(latitude: number, longitude: number): string {
    const url = new URL(this.baseUrl)
    url.searchParams.set("latitude", String(latitude))
    url.searchParams.set("longitude", String(longitude))
    url.searchParams.set("localityLanguage", "en")
    if (this.apiKey) {
      url.searchParams.set("key", this.apiKey)
    }
    return url.toString()
  }

  async enrich(latitude: number, longitude: number): Promise<EnrichmentResult> {
    const url = this.buildUrl(latitude, longitude)

    try {
      const location = await withRetry(
        () => this.lookup(url),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          onRetry: (error, attemptNumber, delayMs) => {
            console.warn(
              `[LocationEnricher] ⚠️ Attempt ${attemptNumber}/${this.maxAttempts} for (${latitude}, ${longitude}) failed, ` +
              `retrying in ${delayMs}ms: ${toErrorMessage(error)}`
            )
          },
        }
      )
      return { status: "resolved", location }
    } catch (error) {
      const reason = toErrorMessage(error)
      console.warn(`[LocationEnricher] ⚠️ Geocoding unavailable for (${latitude}, ${longitude}): ${reason}`)
      return { status: "unavailable", reason }
    }
  }

  private async lookup(url: string): Promise<LocationInfo> {
    try {
      return await fetchWithTimeout(
        url,
        { headers: { Accept: "application/json" } },
        this.requestTimeoutMs,
        (response) => this.readLocation(response),
        this.fetchFn
      )
    } catch (error) {
      if (error instanceof TransientEnrichmentError || error instanceof PermanentEnrichmentFailure) {
        throw error
      }
      // Network errors and timeouts, including a body that never finishes
      throw new TransientEnrichmentError(`Geocoding request failed: ${toErrorMessage(error)}`)
    }
  }

  private async readLocation(response: Response): Promise<LocationInfo> {
    if (!response.ok) {
      const message = `Geocoding returned HTTP ${response.status}`
      if (shouldRetryHttpStatus(response.status)) {
        throw new TransientEnrichmentError(message, response.status)
      }
      throw new PermanentEnrichmentFailure(message)
    }

    const text = await response.text()

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch {
      throw new PermanentEnrichmentFailure("Geocoding response was not valid JSON")
    }

    if (!isObject(body)) {
      throw new PermanentEnrichmentFailure("Geocoding response was not an object")
    }

    return {
      city: blankToNull(body.city),
      locality: blankToNull(body.locality),
      state: blankToNull(body.principalSubdivision),
      country: blankToNull(body.countryName),
    }
  }
}
