/**
 * DynamoDB Fire Record Repository Implementation
 *
 * Implements FireRecordRepository interface using DynamoDB.
 * Table key: fire_id (HASH). Records without a country are indexed under the
 * UNKNOWN region in region-timestamp-index (GSI: region HASH, timestamp RANGE).
 *
 * Idempotent upsert:
 * - conditional put (attribute_not_exists(fire_id)) decides insert vs update
 *   atomically, so two deliveries of one fingerprint cannot both insert;
 * - on conflict, only the enrichment attributes the incoming record carries are
 *   overwritten. created_at is never touched after the first write.
 */

import { ConditionalCheckFailedException } from "@aws-sdk/client-dynamodb"
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  UpdateCommand,
} from "@aws-sdk/lib-dynamodb"
import type {
  DayNight,
  FireConfidence,
  FireRecord,
  FireRecordPage,
  FireRecordRepository,
  RegionQueryOptions,
  UpsertResult,
} from "../../../domain/fire/Fire"
import { regionOf } from "../../../domain/fire/Fire"
import { NotFoundError, TransientStoreError, ValidationError } from "../../../shared/errors"
import type { TimeRange } from "../../../shared/types"
import { DEFAULT_TABLE_NAME } from "../../../shared/config"

export const REGION_INDEX_NAME = "region-timestamp-index"

type FireItem = Record<string, unknown>

const TRANSIENT_ERROR_NAMES = new Set([
  "ProvisionedThroughputExceededException",
  "ThrottlingException",
  "RequestLimitExceeded",
  "InternalServerError",
  "ServiceUnavailable",
  "TransactionConflictException",
  "TimeoutError",
])

const LOCATION_ATTRIBUTES = [
  ["locationCity", "location_city"],
  ["locationLocality", "location_locality"],
  ["locationState", "location_state"],
  ["locationCountry", "location_country"],
] as const

function readString(item: FireItem, key: string): string {
  const value = item[key]
  if (typeof value !== "string") {
    throw new Error(`Fire item attribute ${key} is not a string`)
  }
  return value
}

function readOptionalString(item: FireItem, key: string): string | null {
  const value = item[key]
  return typeof value === "string" && value !== "" ? value : null
}

function readNumber(item: FireItem, key: string): number {
  const value = item[key]
  if (typeof value !== "number") {
    throw new Error(`Fire item attribute ${key} is not a number`)
  }
  return value
}

function readConfidence(item: FireItem): FireConfidence {
  const value = item.confidence
  if (value === "low" || value === "nominal" || value === "high") {
    return value
  }
  throw new Error(`Fire item has unknown confidence ${String(value)}`)
}

function readDayNight(item: FireItem): DayNight {
  const value = item.daynight
  if (value === "D" || value === "N") {
    return value
  }
  throw new Error(`Fire item has unknown daynight ${String(value)}`)
}

export function mapItemToFireRecord(item: FireItem): FireRecord {
  return {
    fireId: readString(item, "fire_id"),
    timestamp: readNumber(item, "timestamp"),
    latitude: readNumber(item, "latitude"),
    longitude: readNumber(item, "longitude"),
    brightness: readNumber(item, "brightness"),
    confidence: readConfidence(item),
    frp: readNumber(item, "frp"),
    acqDate: readString(item, "acq_date"),
    acqTime: readString(item, "acq_time"),
    satellite: readOptionalString(item, "satellite") ?? "",
    instrument: readOptionalString(item, "instrument") ?? "",
    dayNight: readDayNight(item),
    locationCity: readOptionalString(item, "location_city"),
    locationLocality: readOptionalString(item, "location_locality"),
    locationState: readOptionalString(item, "location_state"),
    locationCountry: readOptionalString(item, "location_country"),
    createdAt: new Date(readString(item, "created_at")),
    updatedAt: new Date(readString(item, "updated_at")),
  }
}

export function mapFireRecordToItem(record: FireRecord): FireItem {
  const item: FireItem = {
    fire_id: record.fireId,
    timestamp: record.timestamp,
    region: regionOf(record),
    latitude: record.latitude,
    longitude: record.longitude,
    brightness: record.brightness,
    confidence: record.confidence,
    frp: record.frp,
    acq_date: record.acqDate,
    acq_time: record.acqTime,
    satellite: record.satellite,
    instrument: record.instrument,
    daynight: record.dayNight,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  }

  for (const [field, attribute] of LOCATION_ATTRIBUTES) {
    const value = record[field]
    if (value !== null) {
      item[attribute] = value
    }
  }

  return item
}

export function encodeCursor(key: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(key)).toString("base64url")
}

export function decodeCursor(cursor: string): Record<string, unknown> {
  let decoded: unknown
  try {
    decoded = JSON.parse(Buffer.from(cursor, "base64url").toString("utf8"))
  } catch {
    throw new ValidationError("cursor is invalid", "cursor")
  }

  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
    throw new ValidationError("cursor is invalid", "cursor")
  }
  return { ...decoded }
}

function isTransientStoreFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false
  }
  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true
  }

  const metadata: unknown = Reflect.get(error, "$metadata")
  if (typeof metadata === "object" && metadata !== null) {
    const status: unknown = Reflect.get(metadata, "httpStatusCode")
    return typeof status === "number" && status >= 500
  }
  return false
}

export class DynamoDBFireRecordRepository implements FireRecordRepository {
  private client: DynamoDBDocumentClient
  private tableName: string

  constructor(client: DynamoDBDocumentClient, tableName: string = DEFAULT_TABLE_NAME) {
    this.client = client
    this.tableName = tableName
  }

  async upsert(record: FireRecord): Promise<UpsertResult> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: mapFireRecordToItem(record),
          ConditionExpression: "attribute_not_exists(fire_id)",
        })
      )
      return { record, inserted: true }
    } catch (error) {
      if (!(error instanceof ConditionalCheckFailedException)) {
        throw this.translateError(error, record.fireId)
      }
    }

    const merged = await this.mergeEnrichment(record)
    return { record: merged, inserted: false }
  }

  async findById(fireId: string): Promise<FireRecord | null> {
    try {
      const response = await this.client.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { fire_id: fireId },
          ConsistentRead: true,
        })
      )

      if (!response.Item) {
        return null
      }

      return mapItemToFireRecord(response.Item)
    } catch (error) {
      throw this.translateError(error, fireId)
    }
  }

  async findByRegion(
    region: string,
    range: TimeRange,
    options: RegionQueryOptions = {}
  ): Promise<FireRecordPage> {
    const command = new QueryCommand({
      TableName: this.tableName,
      IndexName: REGION_INDEX_NAME,
      KeyConditionExpression: "#region = :region AND #timestamp BETWEEN :from AND :to",
      ExpressionAttributeNames: {
        "#region": "region",
        "#timestamp": "timestamp",
      },
      ExpressionAttributeValues: {
        ":region": region,
        ":from": range.from,
        ":to": range.to,
      },
      ScanIndexForward: true, // ASC order (oldest first)
      Limit: options.limit ?? 100,
      ...(options.cursor ? { ExclusiveStartKey: decodeCursor(options.cursor) } : {}),
    })

    const response = await this.client.send(command)

    return {
      items: (response.Items ?? []).map((item) => mapItemToFireRecord(item)),
      nextCursor: response.LastEvaluatedKey ? encodeCursor(response.LastEvaluatedKey) : null,
    }
  }

  /**
   * Overwrites only the enrichment attributes the incoming record carries.
   * With nothing to merge the stored record is returned as is.
   */
  private async mergeEnrichment(record: FireRecord): Promise<FireRecord> {
    const assignments: string[] = []
    const names: Record<string, string> = {}
    const values: Record<string, unknown> = {}

    for (const [field, attribute] of LOCATION_ATTRIBUTES) {
      const value = record[field]
      if (value !== null) {
        assignments.push(`#${attribute} = :${attribute}`)
        names[`#${attribute}`] = attribute
        values[`:${attribute}`] = value
      }
    }

    if (assignments.length === 0) {
      const existing = await this.findById(record.fireId)
      if (!existing) {
        throw new NotFoundError(`Fire ${record.fireId}`)
      }
      return existing
    }

    if (record.locationCountry !== null) {
      assignments.push("#region = :region")
      names["#region"] = "region"
      values[":region"] = regionOf(record)
    }

    assignments.push("#updated_at = :updated_at")
    names["#updated_at"] = "updated_at"
    values[":updated_at"] = record.updatedAt.toISOString()

    try {
      const response = await this.client.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { fire_id: record.fireId },
          UpdateExpression: `SET ${assignments.join(", ")}`,
          ConditionExpression: "attribute_exists(fire_id)",
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: "ALL_NEW",
        })
      )

      if (!response.Attributes) {
        throw new NotFoundError(`Fire ${record.fireId}`)
      }

      return mapItemToFireRecord(response.Attributes)
    } catch (error) {
      throw this.translateError(error, record.fireId)
    }
  }

  private translateError(error: unknown, fireId: string): unknown {
    if (isTransientStoreFailure(error)) {
      const name = error instanceof Error ? error.name : "Error"
      return new TransientStoreError(`Transient DynamoDB error for ${fireId}: ${name}`, error)
    }
    return error
  }
}
