/**
 * Alert Notifier
 *
 * Formats an AlertGroup into a readable summary and publishes it to the alert
 * fan-out. Best effort: a failed publish is logged and returned, stored
 * records are left as they are.
 */

import type { AlertGroup } from "../../domain/alert/AlertGroup"
import type { FireRecord } from "../../domain/fire/Fire"
import type { AlertMessage, AlertPublisher } from "../../domain/pipeline/Pipeline"
import { NotifyError, toErrorMessage } from "../../shared/errors"
import { err, ok } from "../../shared/types"
import type { Result } from "../../shared/types"

export const MAX_LISTED_FIRES = 5
const MAX_SUBJECT_LENGTH = 100

export function formatUtc(epochSeconds: number): string {
  const iso = new Date(epochSeconds * 1000).toISOString()
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`
}

export function formatPlace(record: FireRecord): string {
  const parts = [record.locationCity ?? record.locationLocality, record.locationState]
    .filter((part): part is string => Boolean(part))
  return parts.length > 0 ? parts.join(", ") : "Unknown location"
}

// SNS subjects must be ASCII without line breaks
function toSubject(text: string): string {
  const ascii = text.replace(/[^\x20-\x7E]/g, "?")
  return ascii.length > MAX_SUBJECT_LENGTH ? `${ascii.slice(0, MAX_SUBJECT_LENGTH - 3)}...` : ascii
}

export function formatAlert(group: AlertGroup): AlertMessage {
  const count = group.records.length
  const timestamps = group.records.map((record) => record.timestamp)
  const earliest = Math.min(...timestamps)
  const latest = Math.max(...timestamps)

  const lines = [
    `${count} new active fire(s) detected in ${group.region}.`,
    "",
    earliest === latest
      ? `Detected: ${formatUtc(earliest)}`
      : `Detected between ${formatUtc(earliest)} and ${formatUtc(latest)}`,
    "",
  ]

  for (const record of group.records.slice(0, MAX_LISTED_FIRES)) {
    lines.push(`  • ${formatPlace(record)} (${record.latitude.toFixed(4)}, ${record.longitude.toFixed(4)})`)
    lines.push(`    Confidence: ${record.confidence}, FRP: ${record.frp.toFixed(1)} MW`)
  }

  if (count > MAX_LISTED_FIRES) {
    lines.push(`  ... and ${count - MAX_LISTED_FIRES} more`)
  }

  return {
    subject: toSubject(`Fire Alert: ${count} new fire(s) in ${group.region}`),
    message: lines.join("\n"),
    attributes: {
      fireCount: count,
      region: group.region,
    },
  }
}

export class AlertNotifier {
  constructor(private alertPublisher: AlertPublisher) {}

  async notify(group: AlertGroup): Promise<Result<void, NotifyError>> {
    const alert = formatAlert(group)

    try {
      const messageId = await this.alertPublisher.publish(alert)
      console.log(`[FireAlerts] 📧 Published alert for ${group.region} (MessageId: ${messageId ?? "n/a"})`)
      return ok(undefined)
    } catch (error) {
      const notifyError = new NotifyError(
        `Failed to publish alert for ${group.region}: ${toErrorMessage(error)}`,
        group.region
      )
      console.error(`[FireAlerts] ❌ ${notifyError.message}`)
      return err(notifyError)
    }
  }
}
