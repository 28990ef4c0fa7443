/**
 * NASA FIRMS Active Fire Feed
 *
 * Area API: /api/area/csv/{MAP_KEY}/{SOURCE}/{AREA}/{DAY_RANGE}
 * Sources: VIIRS_SNPP_NRT, VIIRS_NOAA20_NRT, MODIS_NRT. DAY_RANGE is 1..10.
 */

import type { RawFireEvent } from "../../domain/fire/Fire"
import type { FireFeed } from "../../application/sync/FireFetchService"
import type { TimeWindow } from "../../shared/types"
import { ConfigurationError } from "../../shared/errors"
import { fetchWithTimeout } from "../http/httpClient"
import type { FetchFn } from "../http/httpClient"
import { parseFirmsCsv } from "./firmsCsv"

export const FIRMS_AREA_CSV_URL = "https://firms.modaps.eosdis.nasa.gov/api/area/csv"
const PLACEHOLDER_MAP_KEYS = new Set(["YOUR_MAP_KEY_HERE", "YOUR_FIRMS_API_KEY_HERE"])
const MAX_DAY_RANGE = 10

export interface FirmsFireFeedOptions {
  mapKey: string | null
  source?: string
  area?: string
  baseUrl?: string
  requestTimeoutMs?: number
  fetchFn?: FetchFn
}

export function dayRangeFor(window: TimeWindow): number {
  const hours = (window.end.getTime() - window.start.getTime()) / (60 * 60 * 1000)
  return Math.min(Math.max(Math.ceil(hours / 24), 1), MAX_DAY_RANGE)
}

export class FirmsFireFeed implements FireFeed {
  private readonly mapKey: string
  private readonly source: string
  private readonly area: string
  private readonly baseUrl: string
  private readonly requestTimeoutMs: number
  private readonly fetchFn: FetchFn

  constructor(options: FirmsFireFeedOptions) {
    const mapKey = options.mapKey?.trim()
    if (!mapKey || PLACEHOLDER_MAP_KEYS.has(mapKey)) {
      throw new ConfigurationError("NASA FIRMS map key not configured. Please update the secret with your FIRMS map key.")
    }

    this.mapKey = mapKey
    this.source = options.source ?? "VIIRS_SNPP_NRT"
    this.area = options.area ?? "world"
    this.baseUrl = options.baseUrl ?? FIRMS_AREA_CSV_URL
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000
    this.fetchFn = options.fetchFn ?? fetch
  }

  buildUrl(window: TimeWindow): string {
    const segments = [this.mapKey, this.source, this.area, String(dayRangeFor(window))]
    return `${this.baseUrl}/${segments.map((segment) => encodeURIComponent(segment)).join("/")}`
  }

  async fetchFires(window: TimeWindow): Promise<RawFireEvent[]> {
    const url = this.buildUrl(window)
    console.log(`[FireFetch] Fetching ${this.source}/${this.area} (${dayRangeFor(window)} day range)`)

    const fires = await fetchWithTimeout<RawFireEvent[]>(url, {}, this.requestTimeoutMs, async (response) => {
      if (response.status === 404) {
        console.log("[FireFetch] No fire data available (404)")
        return []
      }

      if (!response.ok) {
        throw new Error(`FIRMS request failed: HTTP ${response.status} ${response.statusText}`)
      }

      return parseFirmsCsv(await response.text())
    }, this.fetchFn)

    console.log(`[FireFetch] Parsed ${fires.length} fire records`)
    return fires
  }
}
