/**
 * NotificationGate - Grooming Alerts
 *
 * Decides, per resort, whether a notable-runs notification, a "no notable
 * runs today" notification, or nothing should go out. Evaluation is
 * idempotent: once a Notification is recorded for a report the gate
 * answers `none` for it.
 *
 * A `no_runs` Notification is superseded (deleted) when its report later
 * gains notable runs, so subscribers still get the upgrade.
 */

import { ConsistencyViolationError } from '../lib/errors';
import { isAtOrAfter } from '../lib/localTime';
import { logger } from '../lib/logger';
import type {
  DailyReport,
  GroomingStore,
  NotableReport,
  NotifyDecision,
  Resort,
} from '../types/grooming';

export interface NotificationGateOptions {
  /** Local hour from which an empty day is final */
  noRunsNotifHour: number;
}

export class NotificationGate {
  constructor(
    private readonly store: GroomingStore,
    private readonly options: NotificationGateOptions
  ) {}

  async shouldNotify(resort: Resort, now: Date): Promise<NotifyDecision> {
    const log = logger.child({ resortId: resort.resortId, resort: resort.name });

    const latestWithRuns = await this.store.getLatestDailyReport(resort.resortId, { withRuns: true });
    if (!latestWithRuns) {
      return { type: 'none', reason: 'no report with groomed runs' };
    }

    const notable = await this.requireNotableReport(latestWithRuns);

    if (notable.runIds.length > 0) {
      if (!notable.notification) {
        log.info('Notable runs ready to send', { date: notable.date, notable: notable.runIds.length });
        return { type: 'send', dailyReport: latestWithRuns, notableReport: notable };
      }

      if (notable.notification.kind === 'no_runs') {
        await this.store.deleteNotification(resort.resortId, notable.date, 'no_runs');
        log.info('Superseding no-runs notification with notable runs', {
          date: notable.date,
          supersededId: notable.notification.notificationId,
        });
        return {
          type: 'send',
          dailyReport: latestWithRuns,
          notableReport: { ...notable, notification: null },
        };
      }
    }

    return this.evaluateNoRuns(resort, now, latestWithRuns, notable);
  }

  /**
   * No-runs path: only from the cutoff hour, against the latest report of any size
   */
  private async evaluateNoRuns(
    resort: Resort,
    now: Date,
    latestWithRuns: DailyReport,
    notableWithRuns: NotableReport
  ): Promise<NotifyDecision> {
    if (!isAtOrAfter(now, resort.timezone, this.options.noRunsNotifHour)) {
      return { type: 'none', reason: 'before no-runs cutoff' };
    }

    const latest = (await this.store.getLatestDailyReport(resort.resortId)) ?? latestWithRuns;
    const notable =
      latest.date === latestWithRuns.date ? notableWithRuns : await this.requireNotableReport(latest);

    if (notable.notification) {
      return { type: 'none', reason: 'already notified' };
    }

    if (latest.runIds.length === 0 || notable.runIds.length === 0) {
      logger.info('No notable runs today; no-runs notification due', {
        resortId: resort.resortId,
        date: latest.date,
        groomed: latest.runIds.length,
      });
      return { type: 'send_no_runs', dailyReport: latest, notableReport: notable };
    }

    return { type: 'none', reason: 'nothing to send' };
  }

  private async requireNotableReport(report: DailyReport): Promise<NotableReport> {
    const notable = await this.store.getNotableReport(report.resortId, report.date);
    if (!notable) {
      throw new ConsistencyViolationError(report.resortId, report.date, 'daily report has no notable report');
    }
    return notable;
  }
}
