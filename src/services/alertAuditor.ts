/**
 * AlertAuditor - Grooming Alerts
 *
 * Second line of defense for missed notifications. After the no-runs
 * cutoff plus ALERT_NOTIF_MIN, any resort whose current NotableReport has
 * neither a Notification nor an Alert is flagged.
 */

import { ConsistencyViolationError } from '../lib/errors';
import { isAtOrAfter, localDateOf } from '../lib/localTime';
import { logger } from '../lib/logger';
import type { GroomingStore, NotableReport, Resort } from '../types/grooming';
import { ReportReconciler } from './reportReconciler';

export interface AlertAuditorOptions {
  noRunsNotifHour: number;
  alertNotifMinute: number;
}

export interface AlertCandidate {
  resort: Resort;
  notableReport: NotableReport;
}

export class AlertAuditor {
  constructor(
    private readonly store: GroomingStore,
    private readonly reconciler: ReportReconciler,
    private readonly options: AlertAuditorOptions
  ) {}

  /**
   * Resorts whose expected notification never fired
   */
  async sweep(now: Date): Promise<AlertCandidate[]> {
    const resorts = await this.store.listResorts();
    const candidates: AlertCandidate[] = [];

    for (const resort of resorts) {
      try {
        const notableReport = await this.auditResort(resort, now);
        if (notableReport) {
          candidates.push({ resort, notableReport });
        }
      } catch (error) {
        if (error instanceof ConsistencyViolationError) throw error;
        logger.error('Alert audit failed for resort', error, { resortId: resort.resortId });
      }
    }

    logger.info('Alert sweep complete', {
      resorts: resorts.length,
      flagged: candidates.map((candidate) => candidate.resort.name),
    });
    return candidates;
  }

  private async auditResort(resort: Resort, now: Date): Promise<NotableReport | null> {
    const { noRunsNotifHour, alertNotifMinute } = this.options;
    if (!isAtOrAfter(now, resort.timezone, noRunsNotifHour, alertNotifMinute)) {
      return null;
    }

    const latest = await this.store.getLatestDailyReport(resort.resortId, { withRuns: true });
    if (!latest) {
      return null;
    }

    // A stale latest report means nothing arrived today; audit today's (empty) report instead
    const today = localDateOf(now, resort.timezone);
    const report =
      latest.date === today ? latest : await this.reconciler.ensureDailyReport(resort, today, now);

    const notable = await this.store.getNotableReport(resort.resortId, report.date);
    if (!notable) {
      throw new ConsistencyViolationError(resort.resortId, report.date, 'daily report has no notable report');
    }

    if (notable.notification || notable.alert) {
      return null;
    }

    logger.warn('Notification missing for notable report', {
      resortId: resort.resortId,
      date: notable.date,
    });
    return notable;
  }
}
