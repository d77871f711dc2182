/**
 * Grooming Pipeline Configuration
 *
 * Reads and validates the environment once at bootstrap. Thresholds and
 * cutoffs differ between deployments, so none of them are hardcoded in
 * the services.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

/**
 * Fallback timezone for resorts without one (observed deployment runs on Mountain time)
 */
export const DEFAULT_TIMEZONE = 'America/Denver';

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

/**
 * Environment schema
 */
export const GroomingEnvSchema = z.object({
  TABLE_NAME: z.string().trim().min(1, 'TABLE_NAME is required'),
  AWS_REGION: z.string().trim().min(1).default('us-west-2'),
  NORUNS_NOTIF_HOUR: intFromEnv(8, 0, 23),
  ALERT_NOTIF_MIN: intFromEnv(30, 0, 59),
  RARITY_THRESHOLD: z.coerce
    .number()
    .gt(0, 'RARITY_THRESHOLD must be greater than 0')
    .lt(1, 'RARITY_THRESHOLD must be less than 1')
    .default(0.2),
  RARITY_WINDOW_DAYS: intFromEnv(7, 1, 60),
  FETCH_TIMEOUT_MS: intFromEnv(10000, 100, 120000),
  ALERT_TOPIC_ARN: z.string().trim().optional(),
  REPORT_SITE_URL: z.string().trim().default(''),
  DEFAULT_RESORT_TIMEZONE: z.string().trim().min(1).default(DEFAULT_TIMEZONE),
});

/**
 * Settings consumed by the engine
 */
export interface GroomingConfig {
  tableName: string;
  region: string;
  /** Local hour after which an empty day is considered final */
  noRunsNotifHour: number;
  /** Minutes past noRunsNotifHour at which the alert sweep starts */
  alertNotifMinute: number;
  /** Notable iff groomed in strictly less than this fraction of the window */
  rarityThreshold: number;
  rarityWindowDays: number;
  fetchTimeoutMs: number;
  alertTopicArn: string | null;
  reportSiteUrl: string;
  defaultTimezone: string;
}

/**
 * Parse configuration from an environment map
 */
export function loadGroomingConfig(env: NodeJS.ProcessEnv = process.env): GroomingConfig {
  // Empty strings mean "unset" so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = GroomingEnvSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    tableName: values.TABLE_NAME,
    region: values.AWS_REGION,
    noRunsNotifHour: values.NORUNS_NOTIF_HOUR,
    alertNotifMinute: values.ALERT_NOTIF_MIN,
    rarityThreshold: values.RARITY_THRESHOLD,
    rarityWindowDays: values.RARITY_WINDOW_DAYS,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    alertTopicArn: values.ALERT_TOPIC_ARN || null,
    reportSiteUrl: values.REPORT_SITE_URL,
    defaultTimezone: values.DEFAULT_RESORT_TIMEZONE,
  };
}
