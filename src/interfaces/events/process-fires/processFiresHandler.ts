/**
 * Process Fires Lambda Handler
 *
 * SQS trigger (batch size 10, ReportBatchItemFailures enabled)
 * Validates, fingerprints, geocodes and stores each fire. A message is
 * reported as failed only when it could not be settled (e.g. the dead-letter
 * queue was unreachable), so SQS redelivers just that message.
 */

import type { SQSBatchItemFailure, SQSBatchResponse, SQSEvent } from "aws-lambda"
import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { SQSClient } from "@aws-sdk/client-sqs"
import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { FireStore } from "../../../application/fire/FireStore"
import { FireProcessService } from "../../../application/sync/FireProcessService"
import { DynamoDBFireRecordRepository } from "../../../infrastructure/dynamodb/repositories/FireRecordRepository"
import { BigDataCloudGeocoder } from "../../../infrastructure/geocoding/BigDataCloudGeocoder"
import { SqsDeadLetterChannel } from "../../../infrastructure/sqs/SqsDeadLetterChannel"
import { SecretsManagerSecretSource } from "../../../infrastructure/secrets/SecretsManagerSecretSource"
import type { SecretSource } from "../../../domain/pipeline/Pipeline"
import type { EnrichmentConfig } from "../../../shared/config"
import { loadProcessConfig } from "../../../shared/config"
import { toErrorMessage } from "../../../shared/errors"
import { lazyAsync } from "../../../shared/utils/lazy"

/**
 * Geocoder with the optional API key; without one, requests go out keyless
 * at the provider's reduced quota. Built once per container: when the secret
 * cannot be read, the container stays keyless until it is recycled.
 */
export async function buildGeocoder(
  config: EnrichmentConfig,
  secretSource: SecretSource
): Promise<BigDataCloudGeocoder> {
  const secret = config.secretName ? await secretSource.getSecretJson(config.secretName) : null
  const apiKey = secret?.api_key ?? null

  if (!apiKey) {
    console.warn("[LocationEnricher] ⚠️ No geocoder API key configured, using keyless requests")
  }

  return new BigDataCloudGeocoder({
    apiKey,
    requestTimeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
  })
}

async function buildService(): Promise<FireProcessService> {
  const config = loadProcessConfig()

  const dynamoClient = DynamoDBDocumentClient.from(new DynamoDBClient({}))
  const fireRecordRepository = new DynamoDBFireRecordRepository(dynamoClient, config.tableName)
  const fireStore = new FireStore(fireRecordRepository, {
    maxAttempts: config.storeMaxAttempts,
    retryBaseDelayMs: config.storeRetryBaseDelayMs,
  })

  const secretSource = new SecretsManagerSecretSource(new SecretsManagerClient({}))
  const geocoder = await buildGeocoder(config.enrichment, secretSource)
  const deadLetterChannel = new SqsDeadLetterChannel(new SQSClient({}), config.deadLetterQueueUrl)

  return new FireProcessService(fireStore, geocoder, deadLetterChannel, config.concurrency)
}

export function createProcessFiresHandler(getService: () => Promise<FireProcessService>) {
  return async function handler(event: SQSEvent): Promise<SQSBatchResponse> {
    console.log(`[FireProcess] 🔄 Processing ${event.Records.length} SQS messages`)

    const service = await getService()
    const batchItemFailures: SQSBatchItemFailure[] = []

    for (const record of event.Records) {
      try {
        await service.processMessageBody(record.body)
      } catch (error) {
        console.error(`[FireProcess] ❌ Message ${record.messageId} will be redelivered: ${toErrorMessage(error)}`)
        batchItemFailures.push({ itemIdentifier: record.messageId })
      }
    }

    return { batchItemFailures }
  }
}

export const handler = createProcessFiresHandler(lazyAsync(buildService))
