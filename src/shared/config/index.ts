/**
 * Pipeline Configuration
 *
 * Each Lambda reads its environment once and hands an explicit config object
 * to the services it builds. Services never read process.env themselves.
 */

import { ConfigurationError } from "../errors"

type Env = Record<string, string | undefined>

export const DEFAULT_TABLE_NAME = "fire-records"

export interface FetchConfig {
  queueUrl: string
  firmsSecretName: string
  firmsSource: string
  firmsArea: string
  windowHours: number
  batchSize: number
}

export interface EnrichmentConfig {
  secretName: string | null
  timeoutMs: number
  maxAttempts: number
  retryBaseDelayMs: number
}

export interface ProcessConfig {
  tableName: string
  deadLetterQueueUrl: string
  concurrency: number
  storeMaxAttempts: number
  storeRetryBaseDelayMs: number
  enrichment: EnrichmentConfig
}

export interface AlertConfig {
  topicArn: string
}

export interface BackfillConfig {
  tableName: string
  windowHours: number
  concurrency: number
  enrichment: EnrichmentConfig
}

export interface QueryConfig {
  tableName: string
}

function required(env: Env, name: string): string {
  const value = env[name]?.trim()
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is required`)
  }
  return value
}

function optional(env: Env, name: string): string | null {
  const value = env[name]?.trim()
  return value ? value : null
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  if (!raw) {
    return fallback
  }

  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`)
  }
  return parsed
}

function loadEnrichmentConfig(env: Env): EnrichmentConfig {
  return {
    secretName: optional(env, "GEOCODER_SECRET_NAME"),
    timeoutMs: positiveInt(env, "ENRICHMENT_TIMEOUT_MS", 10_000),
    maxAttempts: positiveInt(env, "ENRICHMENT_MAX_ATTEMPTS", 3),
    retryBaseDelayMs: 500,
  }
}

export function loadFetchConfig(env: Env = process.env): FetchConfig {
  return {
    queueUrl: required(env, "FIRE_QUEUE_URL"),
    firmsSecretName: required(env, "FIRMS_SECRET_NAME"),
    firmsSource: optional(env, "FIRMS_SOURCE") ?? "VIIRS_SNPP_NRT",
    firmsArea: optional(env, "FIRMS_AREA") ?? "world",
    windowHours: positiveInt(env, "FETCH_WINDOW_HOURS", 24),
    batchSize: positiveInt(env, "FETCH_BATCH_SIZE", 10),
  }
}

export function loadProcessConfig(env: Env = process.env): ProcessConfig {
  return {
    tableName: optional(env, "DYNAMODB_TABLE_NAME") ?? DEFAULT_TABLE_NAME,
    deadLetterQueueUrl: required(env, "DEAD_LETTER_QUEUE_URL"),
    concurrency: positiveInt(env, "PROCESS_CONCURRENCY", 5),
    storeMaxAttempts: positiveInt(env, "STORE_MAX_ATTEMPTS", 3),
    storeRetryBaseDelayMs: 200,
    enrichment: loadEnrichmentConfig(env),
  }
}

export function loadAlertConfig(env: Env = process.env): AlertConfig {
  return {
    topicArn: required(env, "ALERT_TOPIC_ARN"),
  }
}

export function loadBackfillConfig(env: Env = process.env): BackfillConfig {
  return {
    tableName: optional(env, "DYNAMODB_TABLE_NAME") ?? DEFAULT_TABLE_NAME,
    windowHours: positiveInt(env, "BACKFILL_WINDOW_HOURS", 48),
    concurrency: positiveInt(env, "PROCESS_CONCURRENCY", 5),
    enrichment: loadEnrichmentConfig(env),
  }
}

export function loadQueryConfig(env: Env = process.env): QueryConfig {
  return {
    tableName: optional(env, "DYNAMODB_TABLE_NAME") ?? DEFAULT_TABLE_NAME,
  }
}
