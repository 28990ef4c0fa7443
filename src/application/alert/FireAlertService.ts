/**
 * Fire Alert Service
 *
 * One alert cycle: mutation events in, one notification per region out.
 */

import type { FireMutationEvent } from "../../domain/fire/Fire"
import type { NotifyError } from "../../shared/errors"
import type { AlertNotifier } from "./AlertNotifier"
import type { FireChangeDetector } from "./FireChangeDetector"

export interface AlertCycleSummary {
  events: number
  newFires: number
  groups: number
  notified: number
  failed: number
  errors: NotifyError[]
}

export class FireAlertService {
  constructor(
    private changeDetector: FireChangeDetector,
    private alertNotifier: AlertNotifier
  ) {}

  async handleCycle(events: FireMutationEvent[]): Promise<AlertCycleSummary> {
    const groups = this.changeDetector.detect(events)
    const summary: AlertCycleSummary = {
      events: events.length,
      newFires: groups.reduce((sum, group) => sum + group.records.length, 0),
      groups: groups.length,
      notified: 0,
      failed: 0,
      errors: [],
    }

    for (const group of groups) {
      const result = await this.alertNotifier.notify(group)
      if (result.ok) {
        summary.notified++
      } else {
        summary.failed++
        summary.errors.push(result.error)
      }
    }

    console.log(
      `[FireAlerts] Cycle complete: ${summary.newFires} new fire(s) in ${summary.groups} region(s), ` +
      `${summary.notified} notified, ${summary.failed} failed`
    )

    return summary
  }
}
