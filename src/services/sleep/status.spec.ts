import { SleepStatus } from '../../types/enums/sleepStatusEnum';
import { InvalidInputError } from '../../utils/errors';
import { sleepStatusFor } from './status';

test.each([
  [0, SleepStatus.BAD],
  [329, SleepStatus.BAD],
  [330, SleepStatus.SOSO],
  [389, SleepStatus.SOSO],
  [390, SleepStatus.GOOD],
  [449, SleepStatus.GOOD],
  [450, SleepStatus.EXCELLENT],
  [540, SleepStatus.EXCELLENT],
  [541, SleepStatus.OVERSLEEP],
  [1440, SleepStatus.OVERSLEEP],
])('%i minutes is %s', (minutes, status) => {
  expect(sleepStatusFor(minutes)).toBe(status);
});

test.each([-1, 1441, 7.5])('rejects %p minutes', (minutes) => {
  expect(() => sleepStatusFor(minutes)).toThrow(InvalidInputError);
});
