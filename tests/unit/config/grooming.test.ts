/**
 * Unit Tests for grooming configuration
 */

import { loadGroomingConfig } from '../../../src/config/grooming';
import { ConfigurationError } from '../../../src/lib/errors';

describe('loadGroomingConfig', () => {
  it('should apply defaults for everything but the table name', () => {
    const config = loadGroomingConfig({ TABLE_NAME: 'grooming-test' });

    expect(config).toEqual({
      tableName: 'grooming-test',
      region: 'us-west-2',
      noRunsNotifHour: 8,
      alertNotifMinute: 30,
      rarityThreshold: 0.2,
      rarityWindowDays: 7,
      fetchTimeoutMs: 10000,
      alertTopicArn: null,
      reportSiteUrl: '',
      defaultTimezone: 'America/Denver',
    });
  });

  it('should coerce numeric settings and treat empty strings as unset', () => {
    const config = loadGroomingConfig({
      TABLE_NAME: 'grooming-test',
      NORUNS_NOTIF_HOUR: '9',
      ALERT_NOTIF_MIN: '',
      RARITY_THRESHOLD: '0.25',
      ALERT_TOPIC_ARN: 'arn:aws:sns:us-west-2:000000000000:ops-alerts',
    });

    expect(config.noRunsNotifHour).toBe(9);
    expect(config.alertNotifMinute).toBe(30);
    expect(config.rarityThreshold).toBe(0.25);
    expect(config.alertTopicArn).toBe('arn:aws:sns:us-west-2:000000000000:ops-alerts');
  });

  it('should list every invalid setting', () => {
    try {
      loadGroomingConfig({ NORUNS_NOTIF_HOUR: '24', RARITY_THRESHOLD: '1' });
      throw new Error('expected ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toEqual([
        'TABLE_NAME: Required',
        'NORUNS_NOTIF_HOUR: Number must be less than or equal to 23',
        'RARITY_THRESHOLD: RARITY_THRESHOLD must be less than 1',
      ]);
    }
  });
});
