import { ExerciseType } from '../../types/enums/exerciseTypeEnum';
import { Intensity } from '../../types/enums/intensityEnum';
import { NotFoundError } from '../../utils/errors';
import { maleProfile, memoryServices } from './testSupport';
import type { ExerciseInput } from './exerciseLogService';

const run: ExerciseInput = {
  date: '2026-06-01',
  exerciseType: ExerciseType.RUNNING,
  durationMinutes: 30,
  intensity: Intensity.MEDIUM,
};

const day = (date: string) => ({ user: 'user-1', day: date });

test('add estimates calories at 70 kg without a measurement', async () => {
  const { exercises, ledger } = memoryServices();
  const saved = await exercises.add('user-1', run);
  expect(saved.caloriesBurned).toBe(280);

  const l = await ledger.getLedger(day('2026-06-01'));
  expect(l).toMatchObject({ totalCaloriesOut: 280, exerciseMinutes: 30, exerciseCount: 1, bmr: 0, tdee: 0 });
});

test('add uses the latest weight and seeds the ledger with its metabolic values', async () => {
  const { profiles, bodyMeasurements, exercises, ledger } = memoryServices();
  await profiles.upsert('user-1', maleProfile);
  await bodyMeasurements.record('user-1', { date: '2026-05-30', weight: 80 });

  const saved = await exercises.add('user-1', run);
  expect(saved.caloriesBurned).toBe(320);
  // 10*80 + 6.25*175 - 5*30 + 5
  expect(await ledger.getLedger(day('2026-06-01'))).toMatchObject({ bmr: 1748.75, totalCaloriesOut: 320 });
});

test('a reported calorie figure wins over the estimate', async () => {
  const { exercises } = memoryServices();
  expect((await exercises.add('user-1', { ...run, caloriesBurned: 350 })).caloriesBurned).toBe(350);
});

test('update on the same day applies the difference', async () => {
  const { exercises, ledger } = memoryServices();
  const saved = await exercises.add('user-1', run);
  await exercises.update('user-1', saved.id, { ...run, durationMinutes: 45 });

  const l = await ledger.getLedger(day('2026-06-01'));
  expect([l?.totalCaloriesOut, l?.exerciseMinutes, l?.exerciseCount]).toEqual([420, 45, 1]);
});

test('update across days moves the session', async () => {
  const { exercises, ledger } = memoryServices();
  const saved = await exercises.add('user-1', run);
  await exercises.update('user-1', saved.id, { ...run, date: '2026-06-02', durationMinutes: 45 });

  const before = await ledger.getLedger(day('2026-06-01'));
  const after = await ledger.getLedger(day('2026-06-02'));
  expect([before?.totalCaloriesOut, before?.exerciseMinutes, before?.exerciseCount]).toEqual([0, 0, 0]);
  expect([after?.totalCaloriesOut, after?.exerciseMinutes, after?.exerciseCount]).toEqual([420, 45, 1]);
  expect(await exercises.list('user-1', '2026-06-01')).toEqual([]);
});

test('remove reverses the session', async () => {
  const { exercises, ledger } = memoryServices();
  await exercises.add('user-1', { ...run, caloriesBurned: 100 });
  const saved = await exercises.add('user-1', run);
  await exercises.remove('user-1', saved.id);

  const l = await ledger.getLedger(day('2026-06-01'));
  expect([l?.totalCaloriesOut, l?.exerciseMinutes, l?.exerciseCount]).toEqual([100, 30, 1]);
  expect((await exercises.list('user-1', '2026-06-01')).map((e) => e.caloriesBurned)).toEqual([100]);
});

test('unknown or foreign ids are not found', async () => {
  const { exercises } = memoryServices();
  const saved = await exercises.add('user-1', run);
  await expect(exercises.remove('user-2', saved.id)).rejects.toBeInstanceOf(NotFoundError);
  await expect(exercises.update('user-1', 'missing', run)).rejects.toBeInstanceOf(NotFoundError);
});

test('overlapping updates of one session each reverse the value the other stored', async () => {
  const { exercises, ledger } = memoryServices();
  const saved = await exercises.add('user-1', { ...run, caloriesBurned: 100 });
  await Promise.all([
    exercises.update('user-1', saved.id, { ...run, caloriesBurned: 200 }),
    exercises.update('user-1', saved.id, { ...run, caloriesBurned: 300 }),
  ]);

  const stored = await exercises.get('user-1', saved.id);
  expect(stored.caloriesBurned).toBe(300);
  expect((await ledger.getLedger(day('2026-06-01')))?.totalCaloriesOut).toBe(300);
});

test('a measurement taken after the session day does not seed that day', async () => {
  const { profiles, bodyMeasurements, exercises, ledger } = memoryServices();
  await profiles.upsert('user-1', maleProfile);
  await bodyMeasurements.record('user-1', { date: '2026-06-05', weight: 80 });

  // The estimate still falls back to the only known weight.
  expect((await exercises.add('user-1', run)).caloriesBurned).toBe(320);
  expect(await ledger.getLedger(day('2026-06-01'))).toMatchObject({ bmr: 0, tdee: 0, totalCaloriesOut: 320 });
});

test('the estimate prefers the weight measured on or before the session', async () => {
  const { profiles, bodyMeasurements, exercises } = memoryServices();
  await profiles.upsert('user-1', maleProfile);
  await bodyMeasurements.record('user-1', { date: '2026-05-30', weight: 80 });
  await bodyMeasurements.record('user-1', { date: '2026-06-05', weight: 60 });

  expect((await exercises.add('user-1', run)).caloriesBurned).toBe(320);
});
