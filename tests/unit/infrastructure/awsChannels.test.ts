/**
 * SQS, SNS and Secrets Manager adapter Unit Tests
 */

import { GetSecretValueCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { PublishCommand, SNSClient } from "@aws-sdk/client-sns"
import { SQSClient, SendMessageCommand } from "@aws-sdk/client-sqs"
import { mockClient } from "aws-sdk-client-mock"
import { SecretsManagerSecretSource } from "../../../src/infrastructure/secrets/SecretsManagerSecretSource"
import { SnsAlertPublisher } from "../../../src/infrastructure/sns/SnsAlertPublisher"
import { SqsDeadLetterChannel } from "../../../src/infrastructure/sqs/SqsDeadLetterChannel"
import { SqsFireBatchChannel } from "../../../src/infrastructure/sqs/SqsFireBatchChannel"
import { rawFire } from "../../fakes/fixtures"

const sqsMock = mockClient(SQSClient)
const snsMock = mockClient(SNSClient)
const secretsMock = mockClient(SecretsManagerClient)

const QUEUE_URL = "https://sqs.us-east-1.amazonaws.com/000000000000/fire-processing-queue"

beforeEach(() => {
  sqsMock.reset()
  snsMock.reset()
  secretsMock.reset()
})

describe("SqsFireBatchChannel", () => {
  it("should send the batch as JSON with its size", async () => {
    sqsMock.on(SendMessageCommand).resolves({ MessageId: "m-1" })
    const channel = new SqsFireBatchChannel(new SQSClient({ region: "us-east-1" }), QUEUE_URL)
    const message = { fires: [rawFire(), rawFire()], batch_id: "batch_0", timestamp: "2024-07-01T15:00:00.000Z" }

    await expect(channel.send(message)).resolves.toBe("m-1")

    const input = sqsMock.commandCalls(SendMessageCommand)[0].args[0].input
    expect(input.QueueUrl).toBe(QUEUE_URL)
    expect(JSON.parse(input.MessageBody ?? "")).toEqual(message)
    expect(input.MessageAttributes).toEqual({ batch_size: { DataType: "Number", StringValue: "2" } })
  })
})

describe("SqsDeadLetterChannel", () => {
  it("should keep the payload next to the reason", async () => {
    sqsMock.on(SendMessageCommand).resolves({ MessageId: "d-1" })
    const channel = new SqsDeadLetterChannel(new SQSClient({ region: "us-east-1" }), QUEUE_URL)

    await channel.send({
      payload: { latitude: 200 },
      reason: "latitude out of range",
      batchId: "batch_3",
      failedAt: "2024-07-01T15:00:00.000Z",
    })

    const input = sqsMock.commandCalls(SendMessageCommand)[0].args[0].input
    expect(JSON.parse(input.MessageBody ?? "")).toEqual({
      payload: { latitude: 200 },
      reason: "latitude out of range",
      batch_id: "batch_3",
      failed_at: "2024-07-01T15:00:00.000Z",
    })
    expect(input.MessageAttributes?.failure_reason?.StringValue).toBe("latitude out of range")
  })
})

describe("SnsAlertPublisher", () => {
  it("should publish subject, message and attributes", async () => {
    snsMock.on(PublishCommand).resolves({ MessageId: "sns-1" })
    const publisher = new SnsAlertPublisher(new SNSClient({ region: "us-east-1" }), "arn:aws:sns:us-east-1:000000000000:fire-alerts")

    const messageId = await publisher.publish({
      subject: "Fire Alert: 2 new fire(s) in France",
      message: "2 new active fire(s) detected in France.",
      attributes: { fireCount: 2, region: "France" },
    })

    expect(messageId).toBe("sns-1")
    const input = snsMock.commandCalls(PublishCommand)[0].args[0].input
    expect(input).toEqual({
      TopicArn: "arn:aws:sns:us-east-1:000000000000:fire-alerts",
      Subject: "Fire Alert: 2 new fire(s) in France",
      Message: "2 new active fire(s) detected in France.",
      MessageAttributes: {
        fire_count: { DataType: "Number", StringValue: "2" },
        region: { DataType: "String", StringValue: "France" },
      },
    })
  })
})

describe("SecretsManagerSecretSource", () => {
  it("should parse the secret once and cache it", async () => {
    secretsMock.on(GetSecretValueCommand).resolves({ SecretString: JSON.stringify({ map_key: "test-secret", retries: 3 }) })
    const source = new SecretsManagerSecretSource(new SecretsManagerClient({ region: "us-east-1" }))

    await expect(source.getSecretJson("firms-key")).resolves.toEqual({ map_key: "test-secret" })
    await expect(source.getSecretJson("firms-key")).resolves.toEqual({ map_key: "test-secret" })
    expect(secretsMock.commandCalls(GetSecretValueCommand)).toHaveLength(1)
  })

  it("should resolve null on failure and try again next time", async () => {
    secretsMock
      .on(GetSecretValueCommand)
      .rejectsOnce(new Error("ResourceNotFoundException"))
      .resolves({ SecretString: JSON.stringify({ api_key: "test-secret" }) })
    const source = new SecretsManagerSecretSource(new SecretsManagerClient({ region: "us-east-1" }))

    await expect(source.getSecretJson("geocoder-key")).resolves.toBeNull()
    await expect(source.getSecretJson("geocoder-key")).resolves.toEqual({ api_key: "test-secret" })
  })
})
