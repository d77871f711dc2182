/**
 * Grooming Job Metrics & Logging Helpers
 *
 * CloudWatch metrics and structured logging for the scheduled report
 * cycle and alert sweep.
 */

import {
  CloudWatchClient,
  MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { createLambdaLogger } from '../logger';

const cloudwatch = new CloudWatchClient({});
const NAMESPACE = 'GroomingAlerts/Jobs';

export type JobType = 'REPORT_CYCLE' | 'ALERT_SWEEP';

export interface JobMetrics {
  jobType: JobType;
  runId: string;
  startedAt: Date;
  completedAt?: Date;
  resortCount: number;
  sentCount: number;
  skippedCount: number;
  errorCount: number;
}

export function createJobMetrics(jobType: JobType, runId: string, startedAt: Date): JobMetrics {
  return { jobType, runId, startedAt, resortCount: 0, sentCount: 0, skippedCount: 0, errorCount: 0 };
}

/**
 * Publish job metrics to CloudWatch
 */
export async function publishJobMetrics(
  metrics: JobMetrics,
  client: CloudWatchClient = cloudwatch
): Promise<void> {
  const timestamp = new Date();
  const dimensions = [{ Name: 'JobType', Value: metrics.jobType }];
  const datum = (name: string, value: number, unit: StandardUnit): MetricDatum => ({
    MetricName: name,
    Dimensions: dimensions,
    Value: value,
    Unit: unit,
    Timestamp: timestamp,
  });

  try {
    await client.send(
      new PutMetricDataCommand({
        Namespace: NAMESPACE,
        MetricData: [
          datum('ResortsProcessed', metrics.resortCount, StandardUnit.Count),
          datum('MessagesSent', metrics.sentCount, StandardUnit.Count),
          datum('Skipped', metrics.skippedCount, StandardUnit.Count),
          datum('Errors', metrics.errorCount, StandardUnit.Count),
          datum(
            'JobDuration',
            metrics.completedAt ? metrics.completedAt.getTime() - metrics.startedAt.getTime() : 0,
            StandardUnit.Milliseconds
          ),
        ],
      })
    );
  } catch (err) {
    // Metrics never fail the job
    createLambdaLogger(metrics.runId).error('Failed to publish CloudWatch metrics', err, {
      jobType: metrics.jobType,
    });
  }
}

/**
 * Log structured job event
 */
export function logJobEvent(
  requestId: string,
  event: 'start' | 'complete' | 'error',
  jobType: JobType,
  details: Record<string, unknown> = {}
): void {
  const logger = createLambdaLogger(requestId);
  const baseContext = { jobType, event, ...details };

  switch (event) {
    case 'start':
      logger.info('Grooming job started', baseContext);
      break;
    case 'complete':
      logger.info('Grooming job completed', baseContext);
      break;
    case 'error':
      logger.error('Grooming job error', new Error(String(details['message'] || 'Unknown error')), baseContext);
      break;
  }
}
