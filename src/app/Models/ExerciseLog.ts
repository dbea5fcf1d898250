import { model, Model } from 'mongoose';
import { IExerciseLog, ExerciseLogSchema } from '../../database/schemas/ExerciseLogSchema';

const ExerciseLog: Model<IExerciseLog> = model<IExerciseLog>('ExerciseLog', ExerciseLogSchema, 'exercise_logs');

export { ExerciseLog };
