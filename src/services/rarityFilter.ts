/**
 * RarityFilter - Grooming Alerts
 *
 * Picks the "notable" runs out of a day's groomed runs: those groomed in
 * strictly less than `threshold` of the prior reports inside the trailing
 * window. The current day is never part of its own window.
 */

import { addDays } from '../lib/localTime';
import { logger } from '../lib/logger';
import type { LocalDate, Resort, Run, RunHistoryStore } from '../types/grooming';

export interface RarityFilterOptions {
  /** Fraction in (0, 1); ties are not notable */
  threshold: number;
  /** Number of prior calendar days considered */
  windowDays: number;
}

export class RarityFilter {
  constructor(
    private readonly history: RunHistoryStore,
    private readonly options: RarityFilterOptions
  ) {
    if (!(options.threshold > 0 && options.threshold < 1)) {
      throw new RangeError(`Rarity threshold must be in (0, 1), got ${options.threshold}`);
    }
    if (!Number.isInteger(options.windowDays) || options.windowDays < 1) {
      throw new RangeError(`Rarity window must be a positive whole number of days, got ${options.windowDays}`);
    }
  }

  /**
   * Notable subset of `groomedRuns` for `date`, in input order
   */
  async computeNotableRuns(resort: Resort, date: LocalDate, groomedRuns: Run[]): Promise<Run[]> {
    const log = logger.child({ resortId: resort.resortId, date });

    // date - (windowDays + 1) < d < date
    const windowReports = await this.history.listDailyReportsBetween(
      resort.resortId,
      addDays(date, -(this.options.windowDays + 1)),
      date
    );

    if (windowReports.length === 0) {
      log.debug('No prior reports in window; nothing is notable yet');
      return [];
    }

    const groomedCounts = new Map<string, number>();
    for (const report of windowReports) {
      for (const runId of new Set(report.runIds)) {
        groomedCounts.set(runId, (groomedCounts.get(runId) ?? 0) + 1);
      }
    }

    const notable = groomedRuns.filter((run) => {
      const ratio = (groomedCounts.get(run.runId) ?? 0) / windowReports.length;
      log.debug('Run grooming ratio over window', {
        run: run.name,
        ratio,
        windowSize: windowReports.length,
      });
      return ratio < this.options.threshold;
    });

    log.info('Notable runs computed', {
      windowSize: windowReports.length,
      groomed: groomedRuns.length,
      notable: notable.map((run) => run.name),
    });

    return notable;
  }
}
