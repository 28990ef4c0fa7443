/**
 * Fire Query Service
 *
 * Read path for external consumers: fires of one country over a time range,
 * oldest first, paginated.
 */

import type { FireRecordPage, FireRecordRepository } from "../../domain/fire/Fire"
import { UNKNOWN_REGION } from "../../domain/fire/Fire"
import { ValidationError } from "../../shared/errors"
import type { TimeRange } from "../../shared/types"

export const DEFAULT_PAGE_SIZE = 100
export const MAX_PAGE_SIZE = 500

export interface RegionQueryInput {
  country: string
  range: TimeRange
  limit?: number
  cursor?: string | null
}

export class FireQueryService {
  constructor(private fireRecordRepository: FireRecordRepository) {}

  async queryByRegion(input: RegionQueryInput): Promise<FireRecordPage> {
    const country = input.country.trim()
    if (!country) {
      throw new ValidationError("country is required", "country")
    }

    const { from, to } = input.range
    if (!Number.isFinite(from) || !Number.isFinite(to) || from > to) {
      throw new ValidationError("time range is invalid", "range")
    }

    const limit = Math.min(Math.max(1, input.limit ?? DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE)

    // Unenriched records are indexed under the sentinel region
    const region = country.toUpperCase() === UNKNOWN_REGION ? UNKNOWN_REGION : country

    return this.fireRecordRepository.findByRegion(region, { from, to }, {
      limit,
      cursor: input.cursor ?? null,
    })
  }
}
