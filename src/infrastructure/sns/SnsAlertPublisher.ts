/**
 * SNS fan-out for fire alerts
 */

import { PublishCommand, SNSClient } from "@aws-sdk/client-sns"
import type { AlertMessage, AlertPublisher } from "../../domain/pipeline/Pipeline"

export class SnsAlertPublisher implements AlertPublisher {
  constructor(
    private client: SNSClient,
    private topicArn: string
  ) {}

  async publish(alert: AlertMessage): Promise<string | null> {
    const response = await this.client.send(
      new PublishCommand({
        TopicArn: this.topicArn,
        Subject: alert.subject,
        Message: alert.message,
        MessageAttributes: {
          fire_count: {
            DataType: "Number",
            StringValue: String(alert.attributes.fireCount),
          },
          region: {
            DataType: "String",
            StringValue: alert.attributes.region,
          },
        },
      })
    )

    return response.MessageId ?? null
  }
}
