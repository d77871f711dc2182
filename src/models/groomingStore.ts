/**
 * Grooming Store - Grooming Alerts
 *
 * DynamoDB implementation of the GroomingStore contract.
 * Single-table layout, one partition per resort:
 *   RESORT                 resort descriptor (GSI1 lists all resorts)
 *   RUN#<name>             run, unique by name within the resort
 *   REPORT#<YYYY-MM-DD>    daily report (run ids + optimistic-lock version)
 *   NOTABLE#<YYYY-MM-DD>   notable report with embedded notification/alert
 */

import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandInput,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  ConditionalCheckFailedException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import { docClient as defaultDocClient, getTableName } from '../lib/dynamodb';
import { DEFAULT_TIMEZONE } from '../config/grooming';
import { generateUUID } from '../lib/uuid';
import { addDays } from '../lib/localTime';
import { logger } from '../lib/logger';
import { ConsistencyViolationError, ReportVersionConflictError } from '../lib/errors';
import {
  Alert,
  DailyReport,
  EntityType,
  GroomingStore,
  KeyBuilder,
  LocalDate,
  NotableReport,
  Notification,
  NotificationKind,
  Resort,
  Run,
  RunDifficulty,
} from '../types/grooming';
import {
  DailyReportItemSchema,
  NotableReportItemSchema,
  ResortItemSchema,
  RunItemSchema,
} from './groomingSchemas';

const entityOf = (entityType: EntityType) => ({ entityType });

export class DynamoGroomingStore implements GroomingStore {
  constructor(
    private readonly client: DynamoDBDocumentClient = defaultDocClient,
    private readonly tableName: string = getTableName(),
    private readonly defaultTimezone: string = DEFAULT_TIMEZONE
  ) {}

  // ===========================================================================
  // Resorts
  // ===========================================================================

  async listResorts(): Promise<Resort[]> {
    const items = await this.queryAll({
      TableName: this.tableName,
      IndexName: 'GSI1',
      KeyConditionExpression: 'GSI1PK = :gsi1pk',
      ExpressionAttributeValues: { ':gsi1pk': 'RESORTS' },
    });
    return items.map((item) => {
      const { timezone, ...resort } = ResortItemSchema.parse(item);
      return { ...resort, timezone: timezone ?? this.defaultTimezone };
    });
  }

  // ===========================================================================
  // Runs
  // ===========================================================================

  async getRunByName(resortId: string, name: string): Promise<Run | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: KeyBuilder.run(resortId, name),
      })
    );
    return result.Item ? RunItemSchema.parse(result.Item) : null;
  }

  async createRun(resortId: string, name: string, difficulty: RunDifficulty | null): Promise<Run> {
    const now = new Date().toISOString();
    const run: Run = { runId: generateUUID(), resortId, name, difficulty };

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...KeyBuilder.run(resortId, name),
            ...run,
            ...entityOf('Run'),
            createdAt: now,
            updatedAt: now,
          },
          ConditionExpression: 'attribute_not_exists(PK)',
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        // Another cycle created the same run first; reuse it
        const existing = await this.getRunByName(resortId, name);
        if (existing) return existing;
      }
      throw error;
    }

    logger.info('Run created', { resortId, runId: run.runId, name, difficulty });
    return run;
  }

  async updateRunDifficulty(run: Run, difficulty: RunDifficulty | null): Promise<Run> {
    await this.client.send(
      new UpdateCommand({
        TableName: this.tableName,
        Key: KeyBuilder.run(run.resortId, run.name),
        UpdateExpression: 'SET #difficulty = :difficulty, #updatedAt = :now',
        ConditionExpression: 'attribute_exists(PK)',
        ExpressionAttributeNames: { '#difficulty': 'difficulty', '#updatedAt': 'updatedAt' },
        ExpressionAttributeValues: { ':difficulty': difficulty, ':now': new Date().toISOString() },
      })
    );
    return { ...run, difficulty };
  }

  async getRunsByIds(resortId: string, runIds: string[]): Promise<Run[]> {
    if (runIds.length === 0) return [];

    const wanted = new Set(runIds);
    const items = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'PK = :pk AND begins_with(SK, :skPrefix)',
      ExpressionAttributeValues: { ':pk': `RESORT#${resortId}`, ':skPrefix': 'RUN#' },
    });

    const byId = new Map<string, Run>();
    for (const item of items) {
      const run = RunItemSchema.parse(item);
      if (wanted.has(run.runId)) byId.set(run.runId, run);
    }

    // Preserve caller order
    return runIds.flatMap((runId) => {
      const run = byId.get(runId);
      return run ? [run] : [];
    });
  }

  // ===========================================================================
  // Daily reports
  // ===========================================================================

  async getDailyReport(resortId: string, date: LocalDate): Promise<DailyReport | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: KeyBuilder.dailyReport(resortId, date),
      })
    );
    return result.Item ? DailyReportItemSchema.parse(result.Item) : null;
  }

  async listDailyReportsBetween(
    resortId: string,
    afterDate: LocalDate,
    beforeDate: LocalDate
  ): Promise<DailyReport[]> {
    // BETWEEN is inclusive, so shift both bounds inward by one day
    const from = addDays(afterDate, 1);
    const to = addDays(beforeDate, -1);
    if (from > to) return [];

    const items = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'PK = :pk AND SK BETWEEN :from AND :to',
      ExpressionAttributeValues: {
        ':pk': `RESORT#${resortId}`,
        ':from': `REPORT#${from}`,
        ':to': `REPORT#${to}`,
      },
    });
    return items.map((item) => DailyReportItemSchema.parse(item));
  }

  async getLatestDailyReport(
    resortId: string,
    options: { withRuns?: boolean } = {}
  ): Promise<DailyReport | null> {
    const input: QueryCommandInput = {
      TableName: this.tableName,
      KeyConditionExpression: 'PK = :pk AND begins_with(SK, :skPrefix)',
      ExpressionAttributeValues: { ':pk': `RESORT#${resortId}`, ':skPrefix': 'REPORT#' },
      ScanIndexForward: false,
    };

    if (options.withRuns) {
      input.FilterExpression = 'size(#runIds) > :zero';
      input.ExpressionAttributeNames = { '#runIds': 'runIds' };
      input.ExpressionAttributeValues = { ...input.ExpressionAttributeValues, ':zero': 0 };
    } else {
      input.Limit = 1;
    }

    // Limit applies before the filter, so page until a match shows up
    let exclusiveStartKey: Record<string, unknown> | undefined;
    do {
      const result = await this.client.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      );
      const first = result.Items?.[0];
      if (first) return DailyReportItemSchema.parse(first);
      exclusiveStartKey = options.withRuns ? result.LastEvaluatedKey : undefined;
    } while (exclusiveStartKey);

    return null;
  }

  async createDailyReport(resortId: string, date: LocalDate, now: Date): Promise<DailyReport> {
    const timestamp = now.toISOString();
    const report: DailyReport = {
      resortId,
      date,
      runIds: [],
      version: 1,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    const notable: NotableReport = {
      resortId,
      date,
      runIds: [],
      notification: null,
      alert: null,
      updatedAt: timestamp,
    };

    try {
      await this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Put: {
                TableName: this.tableName,
                Item: { ...KeyBuilder.dailyReport(resortId, date), ...report, ...entityOf('DailyReport') },
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
            {
              Put: {
                TableName: this.tableName,
                Item: { ...KeyBuilder.notableReport(resortId, date), ...notable, ...entityOf('NotableReport') },
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
          ],
        })
      );
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        throw new ReportVersionConflictError(resortId, date, 0);
      }
      throw error;
    }

    logger.info('Daily report created', { resortId, date });
    return report;
  }

  async replaceReportRuns(
    report: DailyReport,
    runIds: string[],
    notableRunIds: string[],
    now: Date
  ): Promise<DailyReport> {
    const timestamp = now.toISOString();

    try {
      await this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Update: {
                TableName: this.tableName,
                Key: KeyBuilder.dailyReport(report.resortId, report.date),
                UpdateExpression: 'SET #runIds = :runIds, #version = :nextVersion, #updatedAt = :now',
                ConditionExpression: '#version = :expectedVersion',
                ExpressionAttributeNames: {
                  '#runIds': 'runIds',
                  '#version': 'version',
                  '#updatedAt': 'updatedAt',
                },
                ExpressionAttributeValues: {
                  ':runIds': runIds,
                  ':nextVersion': report.version + 1,
                  ':expectedVersion': report.version,
                  ':now': timestamp,
                },
              },
            },
            {
              Update: {
                TableName: this.tableName,
                Key: KeyBuilder.notableReport(report.resortId, report.date),
                UpdateExpression: 'SET #runIds = :runIds, #updatedAt = :now',
                ConditionExpression: 'attribute_exists(PK)',
                ExpressionAttributeNames: { '#runIds': 'runIds', '#updatedAt': 'updatedAt' },
                ExpressionAttributeValues: { ':runIds': notableRunIds, ':now': timestamp },
              },
            },
          ],
        })
      );
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        const notableReason = error.CancellationReasons?.[1]?.Code;
        if (notableReason === 'ConditionalCheckFailed') {
          throw new ConsistencyViolationError(report.resortId, report.date, 'notable report is missing');
        }
        throw new ReportVersionConflictError(report.resortId, report.date, report.version);
      }
      throw error;
    }

    return { ...report, runIds, version: report.version + 1, updatedAt: timestamp };
  }

  // ===========================================================================
  // Notable reports, notifications and alerts
  // ===========================================================================

  async getNotableReport(resortId: string, date: LocalDate): Promise<NotableReport | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: KeyBuilder.notableReport(resortId, date),
      })
    );
    return result.Item ? NotableReportItemSchema.parse(result.Item) : null;
  }

  async putNotification(resortId: string, date: LocalDate, notification: Notification): Promise<void> {
    await this.setOnce(resortId, date, 'notification', notification);
  }

  async deleteNotification(resortId: string, date: LocalDate, kind: NotificationKind): Promise<void> {
    try {
      await this.client.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: KeyBuilder.notableReport(resortId, date),
          UpdateExpression: 'SET #notification = :null, #updatedAt = :now',
          ConditionExpression: '#notification.#kind = :kind',
          ExpressionAttributeNames: {
            '#notification': 'notification',
            '#kind': 'kind',
            '#updatedAt': 'updatedAt',
          },
          ExpressionAttributeValues: {
            ':null': null,
            ':kind': kind,
            ':now': new Date().toISOString(),
          },
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        logger.debug('No notification of that kind to delete', { resortId, date, kind });
        return;
      }
      throw error;
    }
  }

  async putAlert(resortId: string, date: LocalDate, alert: Alert): Promise<void> {
    await this.setOnce(resortId, date, 'alert', alert);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Set an embedded record only while it is still null
   */
  private async setOnce(
    resortId: string,
    date: LocalDate,
    field: 'notification' | 'alert',
    value: Notification | Alert
  ): Promise<void> {
    try {
      await this.client.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: KeyBuilder.notableReport(resortId, date),
          UpdateExpression: 'SET #field = :value, #updatedAt = :now',
          ConditionExpression:
            'attribute_exists(PK) AND (attribute_not_exists(#field) OR #field = :null)',
          ExpressionAttributeNames: { '#field': field, '#updatedAt': 'updatedAt' },
          ExpressionAttributeValues: {
            ':value': value,
            ':null': null,
            ':now': new Date().toISOString(),
          },
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new ConsistencyViolationError(
          resortId,
          date,
          `${field} already recorded or notable report missing`
        );
      }
      throw error;
    }
  }

  private async queryAll(input: QueryCommandInput): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const result = await this.client.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      );
      items.push(...(result.Items ?? []));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
  }
}
