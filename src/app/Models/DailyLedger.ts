import { model, Model } from 'mongoose';
import { IDailyLedger, DailyLedgerSchema } from '../../database/schemas/DailyLedgerSchema';

const DailyLedger: Model<IDailyLedger> = model<IDailyLedger>('DailyLedger', DailyLedgerSchema, 'daily_ledgers');

export { DailyLedger };
