/**
 * Tests for checkReports handler
 */

// Mock modules (hoisted by Jest)
jest.mock('../../../lib/logger');
jest.mock('../../../lib/monitoring/cycleMetrics', () => ({
  ...jest.requireActual('../../../lib/monitoring/cycleMetrics'),
  publishJobMetrics: jest.fn().mockResolvedValue(undefined),
  logJobEvent: jest.fn(),
}));
jest.mock('../../dependencies', () => ({
  ...jest.requireActual('../../dependencies'),
  getGroomingEngine: jest.fn(),
}));

import { Context, ScheduledEvent } from 'aws-lambda';
import { handler } from '../../grooming/checkReports';
import { createGroomingEngine, getGroomingEngine } from '../../dependencies';
import { loadGroomingConfig } from '../../../config/grooming';
import { logJobEvent, publishJobMetrics } from '../../../lib/monitoring/cycleMetrics';
import { ConsistencyViolationError } from '../../../lib/errors';
import { InMemoryGroomingStore, testResort } from '../../../../tests/helpers/inMemoryGroomingStore';

describe('checkReports handler', () => {
  const mockContext = {
    awsRequestId: 'test-request-id',
  } as Context;
  const event = { 'detail-type': 'Scheduled Event' } as ScheduledEvent;

  let engine: ReturnType<typeof createGroomingEngine>;

  beforeEach(() => {
    jest.clearAllMocks();
    const store = new InMemoryGroomingStore();
    store.addResort(testResort());
    engine = createGroomingEngine(loadGroomingConfig(), {
      store,
      publisher: {
        confirmedSubscriptions: jest.fn().mockResolvedValue(1),
        publishReport: jest.fn().mockResolvedValue('msg-1'),
        publishAlert: jest.fn().mockResolvedValue('msg-alert-1'),
      },
    });
    jest.mocked(getGroomingEngine).mockReturnValue(engine);
  });

  it('should run one cycle and publish its metrics', async () => {
    jest
      .spyOn(engine.cycle, 'runAllResorts')
      .mockResolvedValue({ resorts: 3, sent: 1, skipped: 1, failed: 1 });

    await handler(event, mockContext, () => undefined);

    expect(engine.cycle.runAllResorts).toHaveBeenCalledTimes(1);
    expect(publishJobMetrics).toHaveBeenCalledWith(
      expect.objectContaining({
        jobType: 'REPORT_CYCLE',
        resortCount: 3,
        sentCount: 1,
        skippedCount: 1,
        errorCount: 1,
      })
    );
    expect(logJobEvent).toHaveBeenLastCalledWith('test-request-id', 'complete', 'REPORT_CYCLE', expect.any(Object));
  });

  it('should record the failure and rethrow', async () => {
    const violation = new ConsistencyViolationError('resort-1', '2024-01-15', 'daily report has no notable report');
    jest.spyOn(engine.cycle, 'runAllResorts').mockRejectedValue(violation);

    await expect(handler(event, mockContext, () => undefined)).rejects.toBe(violation);
    expect(publishJobMetrics).toHaveBeenCalledWith(expect.objectContaining({ errorCount: 1 }));
    expect(logJobEvent).toHaveBeenLastCalledWith('test-request-id', 'error', 'REPORT_CYCLE', {
      runId: expect.any(String),
      message: violation.message,
    });
  });
});
