/**
 * Entity Type Definitions - Grooming Alerts
 *
 * All entities follow the DynamoDB single-table design pattern,
 * partitioned by resort.
 */

/**
 * Calendar date in the resort's local timezone (YYYY-MM-DD)
 */
export type LocalDate = string;

/**
 * Run difficulty classification
 */
export const RUN_DIFFICULTIES = [
  'green',
  'greenblue',
  'blue',
  'blueblack',
  'black',
  'double_black',
  'terrain_park',
  'snowshoe',
] as const;

export type RunDifficulty = (typeof RUN_DIFFICULTIES)[number];

/**
 * Entity type discriminator
 */
export type EntityType = 'Resort' | 'Run' | 'DailyReport' | 'NotableReport';

/**
 * Notification kind
 */
export type NotificationKind = 'normal' | 'no_runs';

/**
 * Resort - owned by the surrounding site, read-only here apart from topicArn
 */
export interface Resort {
  resortId: string;
  name: string;
  timezone: string; // IANA, e.g. America/Denver
  topicArn: string; // SNS topic subscribers listen on
  reportUrl: string;
  displayUrl?: string | null;
}

/**
 * Run - created the first time it is seen groomed
 */
export interface Run {
  runId: string;
  resortId: string;
  name: string;
  difficulty: RunDifficulty | null;
}

/**
 * Raw daily grooming record; one per (resort, date)
 */
export interface DailyReport {
  resortId: string;
  date: LocalDate;
  runIds: string[];
  version: number;
  createdAt: string; // ISO 8601
  updatedAt: string; // ISO 8601
}

/**
 * Record of a delivered (or zero-subscriber) user notification
 */
export interface Notification {
  notificationId: string;
  kind: NotificationKind;
  sentAt: string;
  messageId: string | null; // null when the topic had no confirmed subscribers
}

/**
 * Record of an operational alert for a missed notification
 */
export interface Alert {
  alertId: string;
  raisedAt: string;
  messageId: string;
}

/**
 * Derived notable-run subset of a DailyReport
 */
export interface NotableReport {
  resortId: string;
  date: LocalDate;
  runIds: string[];
  notification: Notification | null;
  alert: Alert | null;
  updatedAt: string;
}

/**
 * A run as parsed from the upstream report
 */
export interface FetchedRun {
  name: string;
  difficulty: RunDifficulty | null;
}

/**
 * Normalized upstream report
 */
export interface FetchedReport {
  date: LocalDate;
  runs: FetchedRun[];
}

/**
 * Outcome of the notification gate
 */
export type NotifyDecision =
  | { type: 'send'; dailyReport: DailyReport; notableReport: NotableReport }
  | { type: 'send_no_runs'; dailyReport: DailyReport; notableReport: NotableReport }
  | { type: 'none'; reason: string };

/**
 * Read-only view over a resort's grooming history
 */
export interface RunHistoryStore {
  getDailyReport(resortId: string, date: LocalDate): Promise<DailyReport | null>;

  /**
   * Reports with `afterDate < date < beforeDate`, oldest first
   */
  listDailyReportsBetween(
    resortId: string,
    afterDate: LocalDate,
    beforeDate: LocalDate
  ): Promise<DailyReport[]>;

  /**
   * Most recent report, optionally only among reports with at least one run
   */
  getLatestDailyReport(
    resortId: string,
    options?: { withRuns?: boolean }
  ): Promise<DailyReport | null>;

  getNotableReport(resortId: string, date: LocalDate): Promise<NotableReport | null>;

  getRunsByIds(resortId: string, runIds: string[]): Promise<Run[]>;
}

/**
 * Full persistence contract used by the engine
 */
export interface GroomingStore extends RunHistoryStore {
  listResorts(): Promise<Resort[]>;

  getRunByName(resortId: string, name: string): Promise<Run | null>;
  createRun(resortId: string, name: string, difficulty: RunDifficulty | null): Promise<Run>;
  updateRunDifficulty(run: Run, difficulty: RunDifficulty | null): Promise<Run>;

  /**
   * Create an empty DailyReport together with its empty NotableReport.
   * Rejects with ReportVersionConflictError when another writer created it first.
   */
  createDailyReport(resortId: string, date: LocalDate, now: Date): Promise<DailyReport>;

  /**
   * Atomically replace a report's run set and its NotableReport run set.
   * Rejects with ReportVersionConflictError when `report.version` is stale.
   */
  replaceReportRuns(
    report: DailyReport,
    runIds: string[],
    notableRunIds: string[],
    now: Date
  ): Promise<DailyReport>;

  /**
   * Record a notification; rejects when one is already present
   */
  putNotification(resortId: string, date: LocalDate, notification: Notification): Promise<void>;

  /**
   * Remove a notification of the given kind; no-op when absent or different
   */
  deleteNotification(resortId: string, date: LocalDate, kind: NotificationKind): Promise<void>;

  /**
   * Record an alert; rejects when one is already present
   */
  putAlert(resortId: string, date: LocalDate, alert: Alert): Promise<void>;
}

/**
 * Single-table key builders
 */
export const KeyBuilder = {
  resort: (resortId: string) => ({
    PK: `RESORT#${resortId}`,
    SK: 'RESORT',
    GSI1PK: 'RESORTS',
    GSI1SK: `RESORT#${resortId}`,
  }),

  run: (resortId: string, name: string) => ({
    PK: `RESORT#${resortId}`,
    SK: `RUN#${name}`,
  }),

  dailyReport: (resortId: string, date: LocalDate) => ({
    PK: `RESORT#${resortId}`,
    SK: `REPORT#${date}`,
  }),

  notableReport: (resortId: string, date: LocalDate) => ({
    PK: `RESORT#${resortId}`,
    SK: `NOTABLE#${date}`,
  }),
};
