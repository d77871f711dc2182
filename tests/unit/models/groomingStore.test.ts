/**
 * DynamoGroomingStore Unit Tests
 *
 * Exercises key layout, conditional writes and error mapping against a
 * mocked docClient.
 */

import {
  GetCommand,
  QueryCommand,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  ConditionalCheckFailedException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import { docClient } from '../../../src/lib/dynamodb';
import { ConsistencyViolationError, ReportVersionConflictError } from '../../../src/lib/errors';
import { DynamoGroomingStore } from '../../../src/models/groomingStore';
import { DailyReport } from '../../../src/types/grooming';

jest.mock('../../../src/lib/logger');
jest.mock('../../../src/lib/dynamodb', () => ({
  ...jest.requireActual('../../../src/lib/dynamodb'),
  docClient: {
    send: jest.fn(),
  },
}));

const TABLE = 'test-grooming-table';
const NOW = new Date('2024-01-15T15:00:00.000Z');

const conditionFailed = () => new ConditionalCheckFailedException({ message: 'The conditional request failed', $metadata: {} });

const sentCommand = (index: number): unknown => (docClient.send as jest.Mock).mock.calls[index]?.[0];

describe('DynamoGroomingStore', () => {
  let store: DynamoGroomingStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new DynamoGroomingStore(docClient, TABLE, 'America/Denver');
  });

  describe('listResorts', () => {
    it('should query the resort index and default a missing timezone', async () => {
      (docClient.send as jest.Mock).mockResolvedValueOnce({
        Items: [
          {
            resortId: 'resort-1',
            name: 'Test Peak',
            topicArn: 'arn:aws:sns:us-west-2:000000000000:test-peak',
            reportUrl: 'https://reports.example.test/test-peak.json',
          },
        ],
      });

      const resorts = await store.listResorts();

      expect(resorts).toEqual([
        {
          resortId: 'resort-1',
          name: 'Test Peak',
          timezone: 'America/Denver',
          topicArn: 'arn:aws:sns:us-west-2:000000000000:test-peak',
          reportUrl: 'https://reports.example.test/test-peak.json',
        },
      ]);
      const command = sentCommand(0);
      expect(command).toBeInstanceOf(QueryCommand);
      expect(command).toMatchObject({
        input: { IndexName: 'GSI1', ExpressionAttributeValues: { ':gsi1pk': 'RESORTS' } },
      });
    });
  });

  describe('createRun', () => {
    it('should reuse the run another writer created first', async () => {
      (docClient.send as jest.Mock)
        .mockRejectedValueOnce(conditionFailed())
        .mockResolvedValueOnce({
          Item: { runId: 'run-existing', resortId: 'resort-1', name: 'Alpha', difficulty: 'blue' },
        });

      const run = await store.createRun('resort-1', 'Alpha', null);

      expect(run).toEqual({ runId: 'run-existing', resortId: 'resort-1', name: 'Alpha', difficulty: 'blue' });
      expect(sentCommand(0)).toMatchObject({ input: { Item: { SK: 'RUN#Alpha', entityType: 'Run' } } });
      expect(sentCommand(1)).toBeInstanceOf(GetCommand);
      expect(sentCommand(1)).toMatchObject({ input: { Key: { PK: 'RESORT#resort-1', SK: 'RUN#Alpha' } } });
    });
  });

  describe('listDailyReportsBetween', () => {
    it('should query the open interval with inclusive bounds moved inward', async () => {
      (docClient.send as jest.Mock).mockResolvedValueOnce({ Items: [] });

      await store.listDailyReportsBetween('resort-1', '2024-01-07', '2024-01-15');

      expect(sentCommand(0)).toMatchObject({
        input: {
          KeyConditionExpression: 'PK = :pk AND SK BETWEEN :from AND :to',
          ExpressionAttributeValues: {
            ':pk': 'RESORT#resort-1',
            ':from': 'REPORT#2024-01-08',
            ':to': 'REPORT#2024-01-14',
          },
        },
      });
    });

    it('should not query when the interval is empty', async () => {
      await expect(store.listDailyReportsBetween('resort-1', '2024-01-14', '2024-01-15')).resolves.toEqual([]);
      expect(docClient.send).not.toHaveBeenCalled();
    });
  });

  describe('getLatestDailyReport', () => {
    it('should page past filtered-out empty reports', async () => {
      const report = {
        resortId: 'resort-1',
        date: '2024-01-12',
        runIds: ['run-1'],
        version: 2,
        createdAt: NOW.toISOString(),
        updatedAt: NOW.toISOString(),
      };
      (docClient.send as jest.Mock)
        .mockResolvedValueOnce({ Items: [], LastEvaluatedKey: { PK: 'RESORT#resort-1', SK: 'REPORT#2024-01-14' } })
        .mockResolvedValueOnce({ Items: [report] });

      const latest = await store.getLatestDailyReport('resort-1', { withRuns: true });

      expect(latest).toEqual(report);
      expect(docClient.send).toHaveBeenCalledTimes(2);
      expect(sentCommand(1)).toMatchObject({
        input: {
          ScanIndexForward: false,
          FilterExpression: 'size(#runIds) > :zero',
          ExclusiveStartKey: { PK: 'RESORT#resort-1', SK: 'REPORT#2024-01-14' },
        },
      });
    });
  });

  describe('createDailyReport', () => {
    it('should write the report and its notable report in one transaction', async () => {
      (docClient.send as jest.Mock).mockResolvedValueOnce({});

      const report = await store.createDailyReport('resort-1', '2024-01-15', NOW);

      expect(report).toEqual({
        resortId: 'resort-1',
        date: '2024-01-15',
        runIds: [],
        version: 1,
        createdAt: NOW.toISOString(),
        updatedAt: NOW.toISOString(),
      });
      const command = sentCommand(0);
      expect(command).toBeInstanceOf(TransactWriteCommand);
      expect(command).toMatchObject({
        input: {
          TransactItems: [
            { Put: { Item: { PK: 'RESORT#resort-1', SK: 'REPORT#2024-01-15', entityType: 'DailyReport' } } },
            {
              Put: {
                Item: {
                  PK: 'RESORT#resort-1',
                  SK: 'NOTABLE#2024-01-15',
                  entityType: 'NotableReport',
                  notification: null,
                  alert: null,
                },
              },
            },
          ],
        },
      });
    });
  });

  describe('replaceReportRuns', () => {
    const report: DailyReport = {
      resortId: 'resort-1',
      date: '2024-01-15',
      runIds: [],
      version: 3,
      createdAt: NOW.toISOString(),
      updatedAt: NOW.toISOString(),
    };

    const cancelled = (codes: string[]) =>
      new TransactionCanceledException({
        message: 'Transaction cancelled',
        $metadata: {},
        CancellationReasons: codes.map((Code) => ({ Code })),
      });

    it('should bump the version under a version condition', async () => {
      (docClient.send as jest.Mock).mockResolvedValueOnce({});

      const updated = await store.replaceReportRuns(report, ['run-1', 'run-2'], ['run-2'], NOW);

      expect(updated.version).toBe(4);
      expect(updated.runIds).toEqual(['run-1', 'run-2']);
      expect(sentCommand(0)).toMatchObject({
        input: {
          TransactItems: [
            {
              Update: {
                ConditionExpression: '#version = :expectedVersion',
                ExpressionAttributeValues: { ':expectedVersion': 3, ':nextVersion': 4 },
              },
            },
            { Update: { ExpressionAttributeValues: { ':runIds': ['run-2'] } } },
          ],
        },
      });
    });

    it('should map a stale version to ReportVersionConflictError', async () => {
      (docClient.send as jest.Mock).mockRejectedValueOnce(cancelled(['ConditionalCheckFailed', 'None']));

      await expect(store.replaceReportRuns(report, ['run-1'], [], NOW)).rejects.toBeInstanceOf(
        ReportVersionConflictError
      );
    });

    it('should map a missing notable report to ConsistencyViolationError', async () => {
      (docClient.send as jest.Mock).mockRejectedValueOnce(cancelled(['None', 'ConditionalCheckFailed']));

      await expect(store.replaceReportRuns(report, ['run-1'], [], NOW)).rejects.toBeInstanceOf(
        ConsistencyViolationError
      );
    });
  });

  describe('putNotification', () => {
    const notification = {
      notificationId: 'notification-1',
      kind: 'normal' as const,
      sentAt: NOW.toISOString(),
      messageId: 'msg-1',
    };

    it('should only set the notification while it is empty', async () => {
      (docClient.send as jest.Mock).mockResolvedValueOnce({});

      await store.putNotification('resort-1', '2024-01-15', notification);

      const command = sentCommand(0);
      expect(command).toBeInstanceOf(UpdateCommand);
      expect(command).toMatchObject({
        input: {
          Key: { PK: 'RESORT#resort-1', SK: 'NOTABLE#2024-01-15' },
          ConditionExpression: 'attribute_exists(PK) AND (attribute_not_exists(#field) OR #field = :null)',
          ExpressionAttributeNames: { '#field': 'notification' },
          ExpressionAttributeValues: { ':value': notification },
        },
      });
    });

    it('should refuse a second notification', async () => {
      (docClient.send as jest.Mock).mockRejectedValueOnce(conditionFailed());

      await expect(store.putNotification('resort-1', '2024-01-15', notification)).rejects.toBeInstanceOf(
        ConsistencyViolationError
      );
    });
  });

  describe('deleteNotification', () => {
    it('should ignore a notification of a different kind', async () => {
      (docClient.send as jest.Mock).mockRejectedValueOnce(conditionFailed());

      await expect(store.deleteNotification('resort-1', '2024-01-15', 'no_runs')).resolves.toBeUndefined();
      expect(sentCommand(0)).toMatchObject({
        input: { ConditionExpression: '#notification.#kind = :kind', ExpressionAttributeValues: { ':kind': 'no_runs' } },
      });
    });
  });
});
