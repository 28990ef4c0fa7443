/**
 * Secrets Manager secret source
 *
 * Secrets are JSON objects of strings ({ "map_key": "..." },
 * { "api_key": "..." }). Successful reads are cached for the life of the
 * container. A secret that is missing or unreadable resolves to null and is
 * read again on the next call; callers decide whether null is fatal.
 */

import { GetSecretValueCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import type { SecretSource } from "../../domain/pipeline/Pipeline"
import { toErrorMessage } from "../../shared/errors"

function toStringRecord(value: unknown): Record<string, string> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null
  }

  const result: Record<string, string> = {}
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      result[key] = entry
    }
  }
  return result
}

export class SecretsManagerSecretSource implements SecretSource {
  private cache = new Map<string, Record<string, string> | null>()

  constructor(private client: SecretsManagerClient) {}

  async getSecretJson(secretName: string): Promise<Record<string, string> | null> {
    const cached = this.cache.get(secretName)
    if (cached !== undefined) {
      return cached
    }

    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretName }))
      const secret = response.SecretString ? toStringRecord(JSON.parse(response.SecretString)) : null
      this.cache.set(secretName, secret)
      return secret
    } catch (error) {
      // Not cached: the next call for this secret tries again
      console.warn(`⚠️ Could not load secret ${secretName}: ${toErrorMessage(error)}`)
      return null
    }
  }
}
