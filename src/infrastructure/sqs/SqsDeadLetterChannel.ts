/**
 * SQS dead-letter channel
 *
 * Keeps the original payload next to the failure reason for manual
 * inspection. Nothing in the pipeline consumes this queue.
 */

import { SQSClient, SendMessageCommand } from "@aws-sdk/client-sqs"
import type { DeadLetterChannel, DeadLetterEntry } from "../../domain/pipeline/Pipeline"

// SQS caps string attribute values well above this; keep reasons readable
const MAX_REASON_LENGTH = 256

export class SqsDeadLetterChannel implements DeadLetterChannel {
  constructor(
    private client: SQSClient,
    private queueUrl: string
  ) {}

  async send(entry: DeadLetterEntry): Promise<void> {
    await this.client.send(
      new SendMessageCommand({
        QueueUrl: this.queueUrl,
        MessageBody: JSON.stringify({
          payload: entry.payload,
          reason: entry.reason,
          batch_id: entry.batchId,
          failed_at: entry.failedAt,
        }),
        MessageAttributes: {
          failure_reason: {
            DataType: "String",
            StringValue: entry.reason.slice(0, MAX_REASON_LENGTH),
          },
        },
      })
    )

    console.log(`[FireProcess] 📨 Dead-lettered (${entry.reason})`)
  }
}
