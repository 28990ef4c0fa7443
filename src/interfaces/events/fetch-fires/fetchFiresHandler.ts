/**
 * Fetch Fires Lambda Handler
 *
 * EventBridge trigger: runs every 15 minutes
 * Pulls the trailing window from NASA FIRMS and queues it in batches.
 */

import type { EventBridgeEvent } from "aws-lambda"
import { SQSClient } from "@aws-sdk/client-sqs"
import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { FireFetchService } from "../../../application/sync/FireFetchService"
import type { FetchSummary } from "../../../application/sync/FireFetchService"
import { FirmsFireFeed } from "../../../infrastructure/firms/FirmsFireFeed"
import { SqsFireBatchChannel } from "../../../infrastructure/sqs/SqsFireBatchChannel"
import { SecretsManagerSecretSource } from "../../../infrastructure/secrets/SecretsManagerSecretSource"
import { loadFetchConfig } from "../../../shared/config"
import { trailingWindow } from "../../../shared/types"
import { lazyAsync } from "../../../shared/utils/lazy"

export interface FetchFiresDependencies {
  fireFetchService: FireFetchService
  windowHours: number
}

async function buildDependencies(): Promise<FetchFiresDependencies> {
  const config = loadFetchConfig()
  const secretSource = new SecretsManagerSecretSource(new SecretsManagerClient({}))
  const secret = await secretSource.getSecretJson(config.firmsSecretName)

  const fireFeed = new FirmsFireFeed({
    mapKey: secret?.map_key ?? secret?.api_key ?? null,
    source: config.firmsSource,
    area: config.firmsArea,
  })
  const channel = new SqsFireBatchChannel(new SQSClient({}), config.queueUrl)

  return {
    fireFetchService: new FireFetchService(fireFeed, channel, config.batchSize),
    windowHours: config.windowHours,
  }
}

export function createFetchFiresHandler(
  getDependencies: () => Promise<FetchFiresDependencies>,
  clock: () => Date = () => new Date()
) {
  return async function handler(
    event: EventBridgeEvent<"Scheduled Event", unknown>
  ): Promise<FetchSummary> {
    console.log("[FireFetch] 🔥 Event received:", JSON.stringify(event, null, 2))

    try {
      const { fireFetchService, windowHours } = await getDependencies()
      const now = clock()
      const summary = await fireFetchService.run(trailingWindow(windowHours, now), now)

      console.log("[FireFetch] Fetch completed:", JSON.stringify(summary, null, 2))

      if (summary.batchesFailed > 0) {
        throw new Error(
          `${summary.batchesFailed} batches failed to queue. Check logs for details.`
        )
      }

      return summary
    } catch (error) {
      console.error("[FireFetch] Error:", error)
      throw error
    }
  }
}

export const handler = createFetchFiresHandler(lazyAsync(buildDependencies))
