/**
 * Check Alerts Handler
 *
 * Runs hourly. Flags resorts whose notable report passed the alert
 * threshold without a notification and raises one operational alert each.
 */

import { ScheduledHandler } from 'aws-lambda';
import { createLambdaLogger, logLambdaInvocation, logLambdaCompletion } from '../../lib/logger';
import { generateUUID } from '../../lib/uuid';
import { createJobMetrics, logJobEvent, publishJobMetrics } from '../../lib/monitoring/cycleMetrics';
import { getGroomingEngine } from '../dependencies';

export const handler: ScheduledHandler = async (event, context) => {
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('checkAlerts', event, context.awsRequestId);

  const runId = generateUUID();
  const startedAt = new Date();
  const metrics = createJobMetrics('ALERT_SWEEP', runId, startedAt);

  logJobEvent(context.awsRequestId, 'start', 'ALERT_SWEEP', { runId });

  try {
    const { auditor, sender } = getGroomingEngine();
    const candidates = await auditor.sweep(startedAt);
    const delivered = await sender.deliverAlerts(candidates, startedAt);

    // resortCount counts flagged resorts for this job
    metrics.resortCount = candidates.length;
    metrics.sentCount = delivered.sent;
    metrics.errorCount = delivered.failed;
    metrics.completedAt = new Date();
    await publishJobMetrics(metrics);

    logJobEvent(context.awsRequestId, 'complete', 'ALERT_SWEEP', {
      ...metrics,
      flagged: candidates.map((candidate) => candidate.resort.resortId),
    });
    logLambdaCompletion('checkAlerts', Date.now() - startedAt.getTime(), context.awsRequestId);
  } catch (err) {
    logger.error('Alert sweep failed', err);
    metrics.errorCount++;
    metrics.completedAt = new Date();
    await publishJobMetrics(metrics);
    logJobEvent(context.awsRequestId, 'error', 'ALERT_SWEEP', {
      runId,
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
};
