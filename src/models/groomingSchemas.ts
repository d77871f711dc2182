/**
 * Zod schemas for persisted grooming entities
 *
 * Items read back from DynamoDB are parsed through these rather than
 * trusted, so a malformed row fails loudly at the store boundary.
 */

import { z } from 'zod';
import { isLocalDate } from '../lib/localTime';
import { RUN_DIFFICULTIES } from '../types/grooming';

export const RunDifficultySchema = z.enum(RUN_DIFFICULTIES);

export const LocalDateSchema = z.string().refine(isLocalDate, 'Date must be a YYYY-MM-DD calendar date');

export const ResortItemSchema = z.object({
  resortId: z.string().min(1),
  name: z.string().min(1),
  timezone: z.string().min(1).nullable().optional(),
  topicArn: z.string().min(1),
  reportUrl: z.string().min(1),
  displayUrl: z.string().nullable().optional(),
});

export const RunItemSchema = z.object({
  runId: z.string().min(1),
  resortId: z.string().min(1),
  name: z.string().min(1),
  difficulty: RunDifficultySchema.nullable(),
});

export const DailyReportItemSchema = z.object({
  resortId: z.string().min(1),
  date: LocalDateSchema,
  runIds: z.array(z.string()),
  version: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const NotificationSchema = z.object({
  notificationId: z.string().min(1),
  kind: z.enum(['normal', 'no_runs']),
  sentAt: z.string(),
  messageId: z.string().nullable(),
});

export const AlertSchema = z.object({
  alertId: z.string().min(1),
  raisedAt: z.string(),
  messageId: z.string(),
});

export const NotableReportItemSchema = z.object({
  resortId: z.string().min(1),
  date: LocalDateSchema,
  runIds: z.array(z.string()),
  notification: NotificationSchema.nullable().default(null),
  alert: AlertSchema.nullable().default(null),
  updatedAt: z.string(),
});
