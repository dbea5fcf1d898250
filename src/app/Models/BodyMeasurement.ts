import { model, Model } from 'mongoose';
import { IBodyMeasurement, BodyMeasurementSchema } from '../../database/schemas/BodyMeasurementSchema';

const BodyMeasurement: Model<IBodyMeasurement> = model<IBodyMeasurement>('BodyMeasurement', BodyMeasurementSchema, 'body_measurements');

export { BodyMeasurement };
