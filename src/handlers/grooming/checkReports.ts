/**
 * Check Reports Handler
 *
 * Runs every 10 minutes. Fetches each resort's grooming report, records
 * it, and sends the day's notable-runs (or no-runs) notification once.
 */

import { ScheduledHandler } from 'aws-lambda';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { generateUUID } from '../../lib/uuid';
import { createJobMetrics, logJobEvent, publishJobMetrics } from '../../lib/monitoring/cycleMetrics';
import { getGroomingEngine } from '../dependencies';

export const handler: ScheduledHandler = async (event, context) => {
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('checkReports', event, context.awsRequestId);

  const runId = generateUUID();
  const startedAt = new Date();
  const metrics = createJobMetrics('REPORT_CYCLE', runId, startedAt);

  logJobEvent(context.awsRequestId, 'start', 'REPORT_CYCLE', { runId });

  try {
    const { cycle } = getGroomingEngine();
    const summary = await cycle.runAllResorts(startedAt);

    metrics.resortCount = summary.resorts;
    metrics.sentCount = summary.sent;
    metrics.skippedCount = summary.skipped;
    metrics.errorCount = summary.failed;
    metrics.completedAt = new Date();
    await publishJobMetrics(metrics);

    logJobEvent(context.awsRequestId, 'complete', 'REPORT_CYCLE', {
      ...metrics,
      durationMs: metrics.completedAt.getTime() - startedAt.getTime(),
    });
    logLambdaCompletion('checkReports', Date.now() - startedAt.getTime(), context.awsRequestId);
  } catch (err) {
    logger.error('Report cycle failed', err);
    metrics.errorCount++;
    metrics.completedAt = new Date();
    await publishJobMetrics(metrics);
    logJobEvent(context.awsRequestId, 'error', 'REPORT_CYCLE', {
      runId,
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
};
