import { createTestEngine } from './support/fixtures';

describe('StatisticsService', () => {
  function seeded() {
    const harness = createTestEngine();
    const { store } = harness;
    const first = store.seedLender({ name: 'First Lender' });
    const second = store.seedLender({ name: 'Second Lender' });
    const borrowers = [
      store.seedBorrower(),
      store.seedBorrower(),
      store.seedBorrower(),
      store.seedBorrower({ status: 'DECLINED_ALL_OPPORTUNITIES' }),
    ];
    store.seedApplication(store.seedAward(), borrowers[0], { status: 'STARTED', lenderId: first.id });
    store.seedApplication(store.seedAward(), borrowers[1], { status: 'APPROVED', lenderId: first.id });
    store.seedApplication(store.seedAward(), borrowers[2], { status: 'SUBMITTED', lenderId: second.id });
    store.seedApplication(store.seedAward(), borrowers[3], { status: 'PENDING' });
    return { ...harness, first, second };
  }

  test('writes global and per-lender rows for the current day', async () => {
    const { engine, store, first, second } = seeded();

    const snapshot = await engine.statistics.recompute();

    expect(snapshot).toEqual({ day: new Date('2024-03-01T00:00:00.000Z'), lenders: 2 });
    const rows = store.statistics();
    expect(rows).toHaveLength(4);
    expect(rows.every(row => row.day === '2024-03-01')).toBe(true);

    const optIn = rows.find(row => row.type === 'BORROWER_OPT_IN_STATISTICS');
    expect(optIn?.data).toEqual({ optedIn: 3, optedOut: 1, optOutPercentage: 25 });

    const global = rows.find(row => row.type === 'APPLICATION_KPIS' && row.lenderId === null);
    expect(global?.data).toMatchObject({
      total: 4,
      byStatus: { PENDING: 1, STARTED: 1, APPROVED: 1, SUBMITTED: 1, REJECTED: 0 },
    });

    const firstRow = rows.find(row => row.lenderId === first.id);
    expect(firstRow?.data).toMatchObject({ total: 2, byStatus: { STARTED: 1, APPROVED: 1, SUBMITTED: 0 } });
    const secondRow = rows.find(row => row.lenderId === second.id);
    expect(secondRow?.data).toMatchObject({ total: 1, byStatus: { SUBMITTED: 1 } });
  });

  test('recomputing on the same day replaces the rows', async () => {
    const { engine, store, clock } = seeded();

    await engine.statistics.recompute();
    await engine.statistics.recompute();
    expect(store.statistics()).toHaveLength(4);

    clock.advanceDays(1);
    await engine.statistics.recompute();
    expect(store.statistics()).toHaveLength(8);
  });

  test('no borrowers means no opt-out percentage', async () => {
    const { engine, store } = createTestEngine();

    await engine.statistics.recompute();

    const optIn = store.statistics().find(row => row.type === 'BORROWER_OPT_IN_STATISTICS');
    expect(optIn?.data).toEqual({ optedIn: 0, optedOut: 0, optOutPercentage: 0 });
  });
});
