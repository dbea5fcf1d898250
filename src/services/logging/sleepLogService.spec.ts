import { SleepStatus } from '../../types/enums/sleepStatusEnum';
import { InvalidInputError } from '../../utils/errors';
import { memoryServices } from './testSupport';

// Local wall-clock times; the logical day does not depend on the machine's timezone.
const at = (day: number, hour: number, minute = 0) => new Date(2026, 0, day, hour, minute);
const key = (date: string) => ({ user: 'user-1', day: date });

test('sleep before the boundary belongs to the previous day', async () => {
  const { sleep, ledger } = memoryServices();
  const saved = await sleep.record('user-1', { recordedAt: at(15, 1, 30), durationMinutes: 420 });
  expect(saved.date).toBe('2026-01-14');
  expect(saved.status).toBe(SleepStatus.GOOD);
  expect(await ledger.getLedger(key('2026-01-14'))).toMatchObject({
    sleepDurationMinutes: 420,
    sleepStatus: SleepStatus.GOOD,
  });
});

test('sleep at or after the boundary belongs to its own day', async () => {
  const { sleep } = memoryServices();
  expect((await sleep.record('user-1', { recordedAt: at(15, 2), durationMinutes: 400 })).date).toBe('2026-01-15');
});

test('the boundary hour comes from configuration', async () => {
  const { sleep } = memoryServices(4);
  expect((await sleep.record('user-1', { recordedAt: at(15, 3), durationMinutes: 400 })).date).toBe('2026-01-14');
});

test('editing the time can move the record to another day', async () => {
  const { sleep, ledger } = memoryServices();
  const saved = await sleep.record('user-1', { recordedAt: at(15, 1, 30), durationMinutes: 420 });
  const moved = await sleep.update('user-1', saved.id, { recordedAt: at(15, 7), durationMinutes: 480 });

  expect(moved.date).toBe('2026-01-15');
  expect(await ledger.getLedger(key('2026-01-14'))).not.toHaveProperty('sleepDurationMinutes');
  expect(await ledger.getLedger(key('2026-01-15'))).toMatchObject({
    sleepDurationMinutes: 480,
    sleepStatus: SleepStatus.EXCELLENT,
  });
});

test('remove clears the day', async () => {
  const { sleep, ledger } = memoryServices();
  const saved = await sleep.record('user-1', { recordedAt: at(15, 7), durationMinutes: 300 });
  await sleep.remove('user-1', saved.id);
  expect(await ledger.getLedger(key('2026-01-15'))).not.toHaveProperty('sleepStatus');
  expect(await sleep.list('user-1', '2026-01-01', '2026-01-31')).toEqual([]);
});

test('an out-of-range duration is rejected before anything is stored', async () => {
  const { sleep, ledger } = memoryServices();
  await expect(sleep.record('user-1', { recordedAt: at(15, 7), durationMinutes: 1500 })).rejects.toBeInstanceOf(InvalidInputError);
  await expect(ledger.getLedger(key('2026-01-15'))).resolves.toBeNull();
});

test('stats cover the logical days of the period ending on the given day', async () => {
  const { sleep } = memoryServices();
  await sleep.record('user-1', { recordedAt: at(8, 7), durationMinutes: 500 });
  await sleep.record('user-1', { recordedAt: at(10, 7), durationMinutes: 420 });
  await sleep.record('user-1', { recordedAt: at(12, 7), durationMinutes: 480 });
  await sleep.record('user-1', { recordedAt: at(15, 1, 30), durationMinutes: 300 });
  await sleep.record('user-1', { recordedAt: at(16, 7), durationMinutes: 400 });

  const stats = await sleep.stats('user-1', 7, '2026-01-15');
  expect(stats).toMatchObject({
    period: 7,
    from: '2026-01-09',
    to: '2026-01-15',
    count: 3,
    totalMinutes: 1200,
    averageMinutes: 400,
    medianMinutes: 420,
    minMinutes: 300,
    maxMinutes: 480,
    changeMinutes: -120,
    mostCommonStatus: SleepStatus.BAD,
    goodSleepPercent: 66.7,
    poorSleepPercent: 33.3,
    consistencyScore: 0.63,
    recentTrend: null,
  });
  expect(stats.statuses.map((s) => s.status)).toEqual([SleepStatus.BAD, SleepStatus.GOOD, SleepStatus.EXCELLENT]);
});

test('stats over a period without records', async () => {
  const { sleep } = memoryServices();
  await expect(sleep.stats('user-1', 30, '2026-03-01')).resolves.toMatchObject({
    from: '2026-01-31',
    count: 0,
    averageMinutes: null,
    consistencyScore: null,
  });
});

test('overlapping edits of one record leave its day with the last stored duration', async () => {
  const { sleep, ledger } = memoryServices();
  const saved = await sleep.record('user-1', { recordedAt: at(15, 7), durationMinutes: 300 });
  await Promise.all([
    sleep.update('user-1', saved.id, { recordedAt: at(14, 7), durationMinutes: 420 }),
    sleep.update('user-1', saved.id, { recordedAt: at(15, 8), durationMinutes: 480 }),
  ]);

  expect(await ledger.getLedger(key('2026-01-14'))).not.toHaveProperty('sleepDurationMinutes');
  expect(await ledger.getLedger(key('2026-01-15'))).toMatchObject({ sleepDurationMinutes: 480 });
});
