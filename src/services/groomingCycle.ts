/**
 * Grooming Cycle - Grooming Alerts
 *
 * One tick of the report pipeline: for every resort, fetch the current
 * grooming report, reconcile it, ask the gate, deliver. Resorts run
 * concurrently and a failing resort never blocks the others.
 */

import {
  ConsistencyViolationError,
  DeliveryError,
  ReportVersionConflictError,
  UpstreamFetchError,
} from '../lib/errors';
import { logger as rootLogger, Logger } from '../lib/logger';
import type { GroomingStore, Resort } from '../types/grooming';
import type { NotificationSender } from './delivery/notificationSender';
import type { ReportFetcher } from './fetch/reportFetcher';
import type { NotificationGate } from './notificationGate';
import type { ReportReconciler } from './reportReconciler';

export type CycleOutcome = 'sent' | 'skipped' | 'failed';

export interface CycleSummary {
  resorts: number;
  sent: number;
  skipped: number;
  failed: number;
}

export interface GroomingCycleDeps {
  store: GroomingStore;
  fetcher: Pick<ReportFetcher, 'fetchReport'>;
  reconciler: Pick<ReportReconciler, 'reconcile'>;
  gate: Pick<NotificationGate, 'shouldNotify'>;
  sender: Pick<NotificationSender, 'deliverDecision'>;
}

export class GroomingCycle {
  constructor(
    private readonly deps: GroomingCycleDeps,
    private readonly log: Logger = rootLogger
  ) {}

  /**
   * fetch → reconcile → gate → deliver for one resort
   */
  async runResortCycle(resort: Resort, now: Date): Promise<CycleOutcome> {
    const log = this.log.child({ resortId: resort.resortId, resort: resort.name });
    const { fetcher, reconciler, gate, sender } = this.deps;

    try {
      const fetched = await fetcher.fetchReport(resort);
      await reconciler.reconcile(resort, fetched.date, fetched.runs, now);

      const decision = await gate.shouldNotify(resort, now);
      if (decision.type === 'none') {
        log.debug('No notification due', { reason: decision.reason });
        return 'skipped';
      }

      await sender.deliverDecision(resort, decision, now);
      return 'sent';
    } catch (error) {
      if (error instanceof UpstreamFetchError) {
        log.warn('Skipping resort; report unavailable', { error: error.message, statusCode: error.statusCode });
        return 'failed';
      }
      if (error instanceof DeliveryError || error instanceof ReportVersionConflictError) {
        log.error('Resort cycle failed; will retry next tick', error);
        return 'failed';
      }
      throw error;
    }
  }

  /**
   * Run every resort concurrently. Consistency violations are rethrown once all resorts settle.
   */
  async runAllResorts(now: Date): Promise<CycleSummary> {
    const resorts = await this.deps.store.listResorts();
    const results = await Promise.allSettled(resorts.map((resort) => this.runResortCycle(resort, now)));

    const summary: CycleSummary = { resorts: resorts.length, sent: 0, skipped: 0, failed: 0 };
    let violation: ConsistencyViolationError | null = null;

    for (const [index, result] of results.entries()) {
      if (result.status === 'fulfilled') {
        summary[result.value]++;
        continue;
      }
      summary.failed++;
      this.log.error('Unexpected failure in resort cycle', result.reason, {
        resortId: resorts[index]?.resortId,
      });
      if (result.reason instanceof ConsistencyViolationError && !violation) {
        violation = result.reason;
      }
    }

    this.log.info('Report cycle complete', { ...summary });
    if (violation) {
      throw violation;
    }
    return summary;
  }
}
