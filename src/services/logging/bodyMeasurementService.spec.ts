import { BmrFormula } from '../../types/enums/bmrFormulaEnum';
import { InvalidInputError, NotFoundError } from '../../utils/errors';
import { maleProfile, memoryServices } from './testSupport';

async function withProfile() {
  const services = memoryServices();
  await services.profiles.upsert('user-1', maleProfile);
  return services;
}

test('a profile is required before measuring', async () => {
  const { bodyMeasurements } = memoryServices();
  await expect(bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 70 })).rejects.toBeInstanceOf(InvalidInputError);
});

test('record caches metabolic values and seeds the day ledger', async () => {
  const { bodyMeasurements, ledger } = await withProfile();
  const m = await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 70 });
  expect(m).toMatchObject({ bmr: 1648.75, tdee: 2555.5625, formulaUsed: BmrFormula.STANDARD_WEIGHT });

  const day = await ledger.getLedger({ user: 'user-1', day: '2026-06-01' });
  expect(day).toMatchObject({ bmr: 1648.75, tdee: 2555.5625, netCalories: -2555.5625, weight: 70 });
});

test.each([
  ['weight below 20 kg', { date: '2026-06-01', weight: 19 }],
  ['body fat above 60 %', { date: '2026-06-01', weight: 70, bodyFatPercent: 61 }],
  ['muscle mass not below weight', { date: '2026-06-01', weight: 70, muscleMass: 70 }],
  ['a malformed date', { date: '06/01/2026', weight: 70 }],
])('rejects %s', async (_label, input) => {
  const { bodyMeasurements, ledger } = await withProfile();
  await expect(bodyMeasurements.record('user-1', input)).rejects.toBeInstanceOf(InvalidInputError);
  await expect(ledger.listLedgers('user-1', '2026-01-01', '2026-12-31')).resolves.toEqual([]);
});

test('editing onto another day moves the mirrored metrics', async () => {
  const { bodyMeasurements, ledger } = await withProfile();
  const m = await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 70 });
  const edited = await bodyMeasurements.edit('user-1', m.id, { date: '2026-06-02', weight: 71, bodyFatPercent: 18 });

  expect(edited).toMatchObject({ id: m.id, bmr: 1627.552, tdee: 2522.7056, formulaUsed: BmrFormula.LEAN_MASS });
  const newDay = await ledger.getLedger({ user: 'user-1', day: '2026-06-02' });
  expect(newDay).toMatchObject({ weight: 71, bodyFatPercent: 18, tdee: 2522.7056 });
  const oldDay = await ledger.getLedger({ user: 'user-1', day: '2026-06-01' });
  expect(oldDay).not.toHaveProperty('weight');
});

test('removing the latest measurement falls back to the previous one of that day', async () => {
  const { bodyMeasurements, ledger } = await withProfile();
  await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 70 });
  const second = await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 71 });
  expect((await ledger.getLedger({ user: 'user-1', day: '2026-06-01' }))?.weight).toBe(71);

  await bodyMeasurements.remove('user-1', second.id);
  expect((await ledger.getLedger({ user: 'user-1', day: '2026-06-01' }))?.weight).toBe(70);
  expect((await bodyMeasurements.list('user-1', '2026-06-01', '2026-06-01')).map((x) => x.weight)).toEqual([70]);
});

test('other users cannot touch a measurement', async () => {
  const { bodyMeasurements } = await withProfile();
  const m = await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 70 });
  await expect(bodyMeasurements.remove('user-2', m.id)).rejects.toBeInstanceOf(NotFoundError);
  await expect(bodyMeasurements.edit('user-1', 'missing', { date: '2026-06-01', weight: 70 })).rejects.toBeInstanceOf(NotFoundError);
});

test('latest is by date, not by creation', async () => {
  const { bodyMeasurements } = await withProfile();
  await bodyMeasurements.record('user-1', { date: '2026-06-03', weight: 72 });
  await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 70 });
  expect((await bodyMeasurements.latest('user-1'))?.weight).toBe(72);
});

test('trends cover the period ending on the given day', async () => {
  const { bodyMeasurements } = await withProfile();
  await bodyMeasurements.record('user-1', { date: '2026-05-01', weight: 75 });
  await bodyMeasurements.record('user-1', { date: '2026-06-01', weight: 72, bodyFatPercent: 20, muscleMass: 31 });
  await bodyMeasurements.record('user-1', { date: '2026-06-10', weight: 71.4, bodyFatPercent: 19.5 });
  await bodyMeasurements.record('user-1', { date: '2026-06-20', weight: 70.9, muscleMass: 31.6 });

  const trend = await bodyMeasurements.trends('user-1', 30, '2026-06-20');
  expect(trend).toMatchObject({ period: 30, from: '2026-05-22', to: '2026-06-20', count: 3 });
  expect(trend.points.map((p) => p.date)).toEqual(['2026-06-01', '2026-06-10', '2026-06-20']);
  expect(trend.weight).toEqual({ average: 71.43, min: 70.9, max: 72, change: -1.1 });
  expect(trend.bodyFatPercent).toEqual({ average: 19.75, min: 19.5, max: 20, change: -0.5 });
  expect(trend.muscleMass).toEqual({ average: 31.3, min: 31, max: 31.6, change: 0.6 });
});

test('trends reject a malformed end day', async () => {
  const { bodyMeasurements } = await withProfile();
  await expect(bodyMeasurements.trends('user-1', 60, '20-06-2026')).rejects.toBeInstanceOf(InvalidInputError);
});
