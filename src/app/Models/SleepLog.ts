import { model, Model } from 'mongoose';
import { ISleepLog, SleepLogSchema } from '../../database/schemas/SleepLogSchema';

const SleepLog: Model<ISleepLog> = model<ISleepLog>('SleepLog', SleepLogSchema, 'sleep_logs');

export { SleepLog };
