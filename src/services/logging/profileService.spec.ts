import { ActivityLevel } from '../../types/enums/activityLevelEnum';
import { InvalidInputError, NotFoundError } from '../../utils/errors';
import { maleProfile, memoryServices } from './testSupport';

test('get fails until a profile exists', async () => {
  const { profiles } = memoryServices();
  await expect(profiles.get('user-1')).rejects.toBeInstanceOf(NotFoundError);
});

test('upsert creates then replaces', async () => {
  const { profiles } = memoryServices();
  await profiles.upsert('user-1', maleProfile);
  await profiles.upsert('user-1', { ...maleProfile, activityLevel: ActivityLevel.VERY_ACTIVE });
  const profile = await profiles.get('user-1');
  expect(profile).toMatchObject({ user: 'user-1', heightCm: 175, activityLevel: ActivityLevel.VERY_ACTIVE });
});

test('rejects implausible heights and future birth dates', async () => {
  const { profiles } = memoryServices();
  await expect(profiles.upsert('user-1', { ...maleProfile, heightCm: 20 })).rejects.toBeInstanceOf(InvalidInputError);
  await expect(profiles.upsert('user-1', { ...maleProfile, birthDate: '2030-01-01' })).rejects.toBeInstanceOf(InvalidInputError);
  await expect(profiles.find('user-1')).resolves.toBeNull();
});
