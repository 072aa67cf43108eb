import { parseWindow, runCommand } from '../src/cli';
import { createTestEngine } from './support/fixtures';

describe('parseWindow', () => {
  test('no dates means the default window', () => {
    expect(parseWindow(undefined, undefined)).toEqual({});
  });

  test('dates are read as UTC midnight', () => {
    expect(parseWindow('2024-02-01', '2024-02-29')).toEqual({
      fromDate: new Date('2024-02-01T00:00:00.000Z'),
      untilDate: new Date('2024-02-29T00:00:00.000Z'),
    });
  });

  test('both bounds are required together', () => {
    expect(() => parseWindow('2024-02-01', undefined)).toThrow('--from-date and --until-date must be given together');
    expect(() => parseWindow(undefined, '2024-02-01')).toThrow('--from-date and --until-date must be given together');
  });

  test('the window must not be inverted', () => {
    expect(() => parseWindow('2024-03-01', '2024-02-01')).toThrow('--from-date must not be after --until-date');
  });

  test('dates must be YYYY-MM-DD', () => {
    expect(() => parseWindow('01/02/2024', '2024-02-29')).toThrow('dates must be YYYY-MM-DD');
  });
});

describe('runCommand', () => {
  test('a state-changing sweep refreshes statistics before returning', async () => {
    const { engine, store } = createTestEngine();
    store.seedApplication(store.seedAward(), store.seedBorrower(), { createdAt: new Date('2024-02-01T00:00:00.000Z') });

    const result = await runCommand(engine, 'lapse-applications', [], {});

    expect(result).toEqual({ candidates: 1, processed: 1, skipped: 0, failed: 0 });
    const global = store.statistics().find(row => row.type === 'APPLICATION_KPIS' && row.lenderId === null);
    expect(global?.data).toMatchObject({ total: 1, byStatus: { LAPSED: 1, PENDING: 0 } });
  });

  test('reminders leave statistics alone', async () => {
    const { engine, store } = createTestEngine();

    await runCommand(engine, 'send-reminders', [], {});

    expect(store.statistics()).toHaveLength(0);
  });

  test('unknown commands are rejected', async () => {
    const { engine } = createTestEngine();

    await expect(runCommand(engine, 'reticulate', [], {})).rejects.toThrow('Unknown command: reticulate');
  });
});
