import { model, Model } from 'mongoose';
import { IMealLog, MealLogSchema } from '../../database/schemas/MealLogSchema';

const MealLog: Model<IMealLog> = model<IMealLog>('MealLog', MealLogSchema, 'meal_logs');

export { MealLog };
