/**
 * SQS delivery channel for fire batches (fetch -> process)
 */

import { SQSClient, SendMessageCommand } from "@aws-sdk/client-sqs"
import type { FireBatchChannel, FireBatchMessage } from "../../domain/pipeline/Pipeline"

export class SqsFireBatchChannel implements FireBatchChannel {
  constructor(
    private client: SQSClient,
    private queueUrl: string
  ) {}

  async send(message: FireBatchMessage): Promise<string | null> {
    const response = await this.client.send(
      new SendMessageCommand({
        QueueUrl: this.queueUrl,
        MessageBody: JSON.stringify(message),
        MessageAttributes: {
          batch_size: {
            DataType: "Number",
            StringValue: String(message.fires.length),
          },
        },
      })
    )

    return response.MessageId ?? null
  }
}
