/**
 * Fires API Handler
 *
 * Handles GET /api/fires
 *
 * Query parameters:
 * - country: Country name as geocoded, or UNKNOWN (required)
 * - from, to: Epoch seconds or ISO-8601 (default: last 24 hours)
 * - limit: Page size (default 100, max 500)
 * - cursor: nextCursor from the previous page
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { FireQueryService } from "../../../application/fire/FireQueryService"
import { DynamoDBFireRecordRepository } from "../../../infrastructure/dynamodb/repositories/FireRecordRepository"
import { loadQueryConfig } from "../../../shared/config"
import { ValidationError } from "../../../shared/errors"
import { lazyAsync } from "../../../shared/utils/lazy"

const DAY_SECONDS = 24 * 60 * 60

function json(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }
}

/**
 * Epoch seconds, or an ISO-8601 date/time
 */
export function parseTimeParam(value: string | undefined, fallback: number, field: string): number {
  if (value === undefined || value.trim() === "") {
    return fallback
  }

  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed)
  }

  const parsed = Date.parse(trimmed)
  if (Number.isNaN(parsed)) {
    throw new ValidationError(`Invalid ${field}`, field)
  }
  return Math.floor(parsed / 1000)
}

async function buildService(): Promise<FireQueryService> {
  const config = loadQueryConfig()
  const dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient({}))
  return new FireQueryService(new DynamoDBFireRecordRepository(dynamoClient, config.tableName))
}

export function createGetFiresHandler(
  getService: () => Promise<FireQueryService>,
  clock: () => Date = () => new Date()
) {
  return async function getFiresHandler(
    event: Pick<APIGatewayProxyEvent, "queryStringParameters">
  ): Promise<APIGatewayProxyResult> {
    try {
      const params = event.queryStringParameters ?? {}
      const country = params.country?.trim()
      if (!country) {
        return json(400, { error: "country is required" })
      }

      const now = Math.floor(clock().getTime() / 1000)
      const to = parseTimeParam(params.to, now, "to")
      const from = parseTimeParam(params.from, to - DAY_SECONDS, "from")
      const limit = params.limit ? parseInt(params.limit, 10) || undefined : undefined

      const service = await getService()
      const page = await service.queryByRegion({
        country,
        range: { from, to },
        limit,
        cursor: params.cursor ?? null,
      })

      return json(200, { fires: page.items, nextCursor: page.nextCursor })
    } catch (error) {
      if (error instanceof ValidationError) {
        return json(400, { error: error.message })
      }

      console.error("[FiresApi] Fires API error:", error)
      return json(500, { error: "Internal server error" })
    }
  }
}

export const getFiresHandler = createGetFiresHandler(lazyAsync(buildService))
