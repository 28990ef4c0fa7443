/**
 * Fire Stream Lambda Handler
 *
 * DynamoDB Streams trigger on the fire table (NEW_IMAGE)
 * One stream batch is one alert cycle. INSERT records are new fires; MODIFY
 * records are upserts of existing fires and never alert. Publish failures are
 * logged and reported in the summary but do not fail the invocation:
 * retrying the batch would re-send the alerts that did go out.
 */

import type { DynamoDBRecord } from "aws-lambda"
import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import { SNSClient } from "@aws-sdk/client-sns"
import { unmarshall } from "@aws-sdk/util-dynamodb"
import { AlertNotifier } from "../../../application/alert/AlertNotifier"
import { FireAlertService } from "../../../application/alert/FireAlertService"
import type { AlertCycleSummary } from "../../../application/alert/FireAlertService"
import { FireChangeDetector } from "../../../application/alert/FireChangeDetector"
import type { FireMutationEvent } from "../../../domain/fire/Fire"
import { mapItemToFireRecord } from "../../../infrastructure/dynamodb/repositories/FireRecordRepository"
import { SnsAlertPublisher } from "../../../infrastructure/sns/SnsAlertPublisher"
import { loadAlertConfig } from "../../../shared/config"
import { lazyAsync } from "../../../shared/utils/lazy"

/**
 * DynamoDBRecord with images typed for @aws-sdk/util-dynamodb
 */
export type FireStreamRecord = Omit<DynamoDBRecord, "dynamodb"> & {
  dynamodb?: {
    NewImage?: Record<string, AttributeValue>
  }
}

export interface FireStreamEvent {
  Records: FireStreamRecord[]
}

export function toMutationEvents(records: FireStreamRecord[]): FireMutationEvent[] {
  const events: FireMutationEvent[] = []

  for (const record of records) {
    if (record.eventName !== "INSERT" && record.eventName !== "MODIFY") {
      continue
    }

    const image = record.dynamodb?.NewImage
    if (!image) {
      console.warn(`[FireAlerts] ⚠️ ${record.eventName} record ${record.eventID ?? ""} has no NewImage, skipping`)
      continue
    }

    try {
      events.push({
        record: mapItemToFireRecord(unmarshall(image)),
        inserted: record.eventName === "INSERT",
      })
    } catch (error) {
      console.error(`[FireAlerts] Error parsing stream record ${record.eventID ?? ""}:`, error)
    }
  }

  return events
}

async function buildService(): Promise<FireAlertService> {
  const config = loadAlertConfig()
  const publisher = new SnsAlertPublisher(new SNSClient({}), config.topicArn)
  return new FireAlertService(new FireChangeDetector(), new AlertNotifier(publisher))
}

export function createFireStreamHandler(getService: () => Promise<FireAlertService>) {
  return async function handler(event: FireStreamEvent): Promise<AlertCycleSummary> {
    console.log(`[FireAlerts] 📊 Processing ${event.Records.length} DynamoDB stream records`)

    const service = await getService()
    const summary = await service.handleCycle(toMutationEvents(event.Records))

    console.log("[FireAlerts] Stream processing complete:", JSON.stringify({
      events: summary.events,
      newFires: summary.newFires,
      groups: summary.groups,
      notified: summary.notified,
      failed: summary.failed,
    }, null, 2))

    return summary
  }
}

export const handler = createFireStreamHandler(lazyAsync(buildService))
