import { ZodError } from 'zod';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  test('fills defaults around the required secret', () => {
    const config = loadConfig({ HASH_SECRET: 'test-secret' });

    expect(config.hashSecret).toBe('test-secret');
    expect(config.quiet).toBe(false);
    expect(config.lifecycle).toEqual({
      applicationExpirationDays: 7,
      reminderDaysBeforeExpiration: 3,
      daysToChangeToLapsed: 14,
      daysToEraseBorrowerData: 30,
      progressToRemindStartedApplications: 0.7,
    });
    expect(config.awardSource).toMatchObject({
      appToken: null,
      pageSize: 10,
      defaultDaysBack: 7,
      http: { timeoutMs: 30_000, maxAttempts: 3, baseDelayMs: 1_000 },
    });
    expect(config.notifications).toEqual({ relayUrl: null, timeoutMs: 10_000 });
    expect(config.scheduler.intervalMs).toBe(3_600_000);
  });

  test('a missing secret is rejected', () => {
    expect(() => loadConfig({})).toThrow(ZodError);
  });

  test('empty values count as unset', () => {
    const config = loadConfig({ HASH_SECRET: 'test-secret', APPLICATION_EXPIRATION_DAYS: '', NOTIFICATION_RELAY_URL: '' });

    expect(config.lifecycle.applicationExpirationDays).toBe(7);
    expect(config.notifications.relayUrl).toBeNull();
  });

  test('parses numbers and flags from strings', () => {
    const config = loadConfig({
      HASH_SECRET: 'test-secret',
      QUIET: 'yes',
      DAYS_TO_CHANGE_TO_LAPSED: '21',
      SCHEDULER_INTERVAL_MINUTES: '15',
    });

    expect(config.quiet).toBe(true);
    expect(config.lifecycle.daysToChangeToLapsed).toBe(21);
    expect(config.scheduler.intervalMs).toBe(900_000);
  });

  test('rejects out-of-range values', () => {
    expect(() => loadConfig({ HASH_SECRET: 'test-secret', PROGRESS_TO_REMIND_STARTED_APPLICATIONS: '1.5' })).toThrow(
      ZodError
    );
    expect(() => loadConfig({ HASH_SECRET: 'test-secret', APPLICATION_EXPIRATION_DAYS: '0' })).toThrow(ZodError);
  });
});
