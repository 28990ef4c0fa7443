/**
 * Backfill Locations Lambda Handler
 *
 * EventBridge trigger: runs hourly
 * Retries reverse-geocoding for fires stored without a location.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { FireStore } from "../../../application/fire/FireStore"
import { LocationBackfillService } from "../../../application/sync/LocationBackfillService"
import type { BackfillSummary } from "../../../application/sync/LocationBackfillService"
import { DynamoDBFireRecordRepository } from "../../../infrastructure/dynamodb/repositories/FireRecordRepository"
import { SecretsManagerSecretSource } from "../../../infrastructure/secrets/SecretsManagerSecretSource"
import { loadBackfillConfig } from "../../../shared/config"
import { trailingWindow } from "../../../shared/types"
import { lazyAsync } from "../../../shared/utils/lazy"
import { buildGeocoder } from "../process-fires/processFiresHandler"

export interface BackfillDependencies {
  locationBackfillService: LocationBackfillService
  windowHours: number
}

async function buildDependencies(): Promise<BackfillDependencies> {
  const config = loadBackfillConfig()

  const dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient({}))
  const fireRecordRepository = new DynamoDBFireRecordRepository(dynamoClient, config.tableName)
  const geocoder = await buildGeocoder(
    config.enrichment,
    new SecretsManagerSecretSource(new SecretsManagerClient({}))
  )

  return {
    locationBackfillService: new LocationBackfillService(
      fireRecordRepository,
      new FireStore(fireRecordRepository),
      geocoder,
      config.concurrency
    ),
    windowHours: config.windowHours,
  }
}

export function createBackfillLocationsHandler(
  getDependencies: () => Promise<BackfillDependencies>,
  clock: () => Date = () => new Date()
) {
  return async function handler(
    event: EventBridgeEvent<"Scheduled Event", unknown>
  ): Promise<BackfillSummary> {
    console.log("[LocationBackfill] Event received:", JSON.stringify(event, null, 2))

    try {
      const { locationBackfillService, windowHours } = await getDependencies()
      const summary = await locationBackfillService.backfill(trailingWindow(windowHours, clock()))
      console.log("[LocationBackfill] Backfill completed:", JSON.stringify(summary, null, 2))
      return summary
    } catch (error) {
      console.error("[LocationBackfill] Error:", error)
      throw error
    }
  }
}

export const handler = createBackfillLocationsHandler(lazyAsync(buildDependencies))
