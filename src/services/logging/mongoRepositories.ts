import { isObjectIdOrHexString, type Types } from "mongoose";
import { BodyMeasurement as BodyMeasurementModel } from "../../app/Models/BodyMeasurement";
import { ExerciseLog as ExerciseLogModel } from "../../app/Models/ExerciseLog";
import { MealLog as MealLogModel } from "../../app/Models/MealLog";
import { SleepLog as SleepLogModel } from "../../app/Models/SleepLog";
import { UserProfile as UserProfileModel } from "../../app/Models/UserProfile";
import type { IBodyMeasurement } from "../../database/schemas/BodyMeasurementSchema";
import type { IExerciseLog } from "../../database/schemas/ExerciseLogSchema";
import type { IMealLog } from "../../database/schemas/MealLogSchema";
import type { ISleepLog } from "../../database/schemas/SleepLogSchema";
import type { IUserProfile } from "../../database/schemas/UserProfileSchema";
import type { CalendarDay } from "../../lib/dayBoundary";
import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";
import type { ExerciseLog } from "../../types/ExerciseLogInterface";
import type { LoggedEvent, NewEvent } from "../../types/LoggedEventInterface";
import type { CalculatedNutrition, FoodProfile, MealLog } from "../../types/MealLogInterface";
import type { UserProfile } from "../../types/ProfileInterface";
import type { SleepLog } from "../../types/SleepLogInterface";
import { withStorage } from "../../utils/storage";
import type { EventRepository, ProfileFields, ProfileRepository } from "./repositories";

type Stored<T> = T & { _id: Types.ObjectId; createdAt: Date; updatedAt: Date };

function meta(doc: Stored<{ user: string; date: string }>): LoggedEvent {
  return {
    id: doc._id.toString(),
    user: doc.user,
    date: doc.date,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function upTo(user: string, onOrBefore?: CalendarDay) {
  return onOrBefore === undefined ? { user } : { user, date: { $lte: onOrBefore } };
}

// Optional numeric paths come back as null or undefined depending on how they were unset.
function optional(value: number | null | undefined): number | undefined {
  return value == null ? undefined : value;
}

function toBodyMeasurement(doc: Stored<IBodyMeasurement>): BodyMeasurement {
  const m: BodyMeasurement = {
    ...meta(doc),
    weight: doc.weight,
    bmr: doc.bmr,
    tdee: doc.tdee,
    formulaUsed: doc.formulaUsed,
  };
  const bodyFatPercent = optional(doc.bodyFatPercent);
  const muscleMass = optional(doc.muscleMass);
  if (bodyFatPercent !== undefined) m.bodyFatPercent = bodyFatPercent;
  if (muscleMass !== undefined) m.muscleMass = muscleMass;
  return m;
}

function toExerciseLog(doc: Stored<IExerciseLog>): ExerciseLog {
  const log: ExerciseLog = {
    ...meta(doc),
    exerciseType: doc.exerciseType,
    durationMinutes: doc.durationMinutes,
    intensity: doc.intensity,
    caloriesBurned: doc.caloriesBurned,
  };
  if (doc.note != null) log.note = doc.note;
  return log;
}

function toSleepLog(doc: Stored<ISleepLog>): SleepLog {
  return {
    ...meta(doc),
    recordedAt: doc.recordedAt,
    durationMinutes: doc.durationMinutes,
    status: doc.status,
  };
}

function toFood(food: FoodProfile): FoodProfile {
  const out: FoodProfile = {
    name: food.name,
    servingSizeGrams: food.servingSizeGrams,
    calories: food.calories,
    carbohydrates: food.carbohydrates,
    protein: food.protein,
    fat: food.fat,
  };
  const sodium = optional(food.sodium);
  const fiber = optional(food.fiber);
  const sugar = optional(food.sugar);
  if (sodium !== undefined) out.sodium = sodium;
  if (fiber !== undefined) out.fiber = fiber;
  if (sugar !== undefined) out.sugar = sugar;
  return out;
}

function toNutrition(n: CalculatedNutrition): CalculatedNutrition {
  const out: CalculatedNutrition = {
    quantity: n.quantity,
    unit: n.unit,
    calories: n.calories,
    carbohydrates: n.carbohydrates,
    protein: n.protein,
    fat: n.fat,
    ratios: { carbs: n.ratios.carbs, protein: n.ratios.protein, fat: n.ratios.fat },
  };
  const sodium = optional(n.sodium);
  const fiber = optional(n.fiber);
  const sugar = optional(n.sugar);
  if (sodium !== undefined) out.sodium = sodium;
  if (fiber !== undefined) out.fiber = fiber;
  if (sugar !== undefined) out.sugar = sugar;
  return out;
}

function toMealLog(doc: Stored<IMealLog>): MealLog {
  return {
    ...meta(doc),
    mealType: doc.mealType,
    food: toFood(doc.food),
    quantity: doc.quantity,
    unit: doc.unit,
    nutrition: toNutrition(doc.nutrition),
  };
}

export class MongoBodyMeasurementRepository implements EventRepository<BodyMeasurement> {
  create(event: NewEvent<BodyMeasurement>): Promise<BodyMeasurement> {
    return withStorage("bodyMeasurements.create", async () => toBodyMeasurement(await BodyMeasurementModel.create(event)));
  }

  findById(user: string, id: string): Promise<BodyMeasurement | null> {
    return withStorage("bodyMeasurements.findById", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await BodyMeasurementModel.findById(id).lean<Stored<IBodyMeasurement>>().exec();
      return doc && doc.user === user ? toBodyMeasurement(doc) : null;
    });
  }

  replace(user: string, id: string, event: NewEvent<BodyMeasurement>): Promise<BodyMeasurement | null> {
    return withStorage("bodyMeasurements.replace", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await BodyMeasurementModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      doc.overwrite({ ...event });
      await doc.save();
      return toBodyMeasurement(doc);
    });
  }

  remove(user: string, id: string): Promise<BodyMeasurement | null> {
    return withStorage("bodyMeasurements.remove", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await BodyMeasurementModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      await doc.deleteOne();
      return toBodyMeasurement(doc);
    });
  }

  list(user: string, from: CalendarDay, to: CalendarDay): Promise<BodyMeasurement[]> {
    return withStorage("bodyMeasurements.list", async () => {
      const docs = await BodyMeasurementModel.find({ user, date: { $gte: from, $lte: to } })
        .sort({ date: 1, createdAt: 1 })
        .lean<Stored<IBodyMeasurement>[]>()
        .exec();
      return docs.map(toBodyMeasurement);
    });
  }

  latest(user: string, onOrBefore?: CalendarDay): Promise<BodyMeasurement | null> {
    return withStorage("bodyMeasurements.latest", async () => {
      const doc = await BodyMeasurementModel.findOne(upTo(user, onOrBefore))
        .sort({ date: -1, createdAt: -1 })
        .lean<Stored<IBodyMeasurement>>()
        .exec();
      return doc ? toBodyMeasurement(doc) : null;
    });
  }
}

export class MongoExerciseLogRepository implements EventRepository<ExerciseLog> {
  create(event: NewEvent<ExerciseLog>): Promise<ExerciseLog> {
    return withStorage("exercises.create", async () => toExerciseLog(await ExerciseLogModel.create(event)));
  }

  findById(user: string, id: string): Promise<ExerciseLog | null> {
    return withStorage("exercises.findById", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await ExerciseLogModel.findById(id).lean<Stored<IExerciseLog>>().exec();
      return doc && doc.user === user ? toExerciseLog(doc) : null;
    });
  }

  replace(user: string, id: string, event: NewEvent<ExerciseLog>): Promise<ExerciseLog | null> {
    return withStorage("exercises.replace", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await ExerciseLogModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      doc.overwrite({ ...event });
      await doc.save();
      return toExerciseLog(doc);
    });
  }

  remove(user: string, id: string): Promise<ExerciseLog | null> {
    return withStorage("exercises.remove", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await ExerciseLogModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      await doc.deleteOne();
      return toExerciseLog(doc);
    });
  }

  list(user: string, from: CalendarDay, to: CalendarDay): Promise<ExerciseLog[]> {
    return withStorage("exercises.list", async () => {
      const docs = await ExerciseLogModel.find({ user, date: { $gte: from, $lte: to } })
        .sort({ date: 1, createdAt: 1 })
        .lean<Stored<IExerciseLog>[]>()
        .exec();
      return docs.map(toExerciseLog);
    });
  }

  latest(user: string, onOrBefore?: CalendarDay): Promise<ExerciseLog | null> {
    return withStorage("exercises.latest", async () => {
      const doc = await ExerciseLogModel.findOne(upTo(user, onOrBefore))
        .sort({ date: -1, createdAt: -1 })
        .lean<Stored<IExerciseLog>>()
        .exec();
      return doc ? toExerciseLog(doc) : null;
    });
  }
}

export class MongoSleepLogRepository implements EventRepository<SleepLog> {
  create(event: NewEvent<SleepLog>): Promise<SleepLog> {
    return withStorage("sleepLogs.create", async () => toSleepLog(await SleepLogModel.create(event)));
  }

  findById(user: string, id: string): Promise<SleepLog | null> {
    return withStorage("sleepLogs.findById", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await SleepLogModel.findById(id).lean<Stored<ISleepLog>>().exec();
      return doc && doc.user === user ? toSleepLog(doc) : null;
    });
  }

  replace(user: string, id: string, event: NewEvent<SleepLog>): Promise<SleepLog | null> {
    return withStorage("sleepLogs.replace", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await SleepLogModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      doc.overwrite({ ...event });
      await doc.save();
      return toSleepLog(doc);
    });
  }

  remove(user: string, id: string): Promise<SleepLog | null> {
    return withStorage("sleepLogs.remove", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await SleepLogModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      await doc.deleteOne();
      return toSleepLog(doc);
    });
  }

  list(user: string, from: CalendarDay, to: CalendarDay): Promise<SleepLog[]> {
    return withStorage("sleepLogs.list", async () => {
      const docs = await SleepLogModel.find({ user, date: { $gte: from, $lte: to } })
        .sort({ date: 1, createdAt: 1 })
        .lean<Stored<ISleepLog>[]>()
        .exec();
      return docs.map(toSleepLog);
    });
  }

  latest(user: string, onOrBefore?: CalendarDay): Promise<SleepLog | null> {
    return withStorage("sleepLogs.latest", async () => {
      const doc = await SleepLogModel.findOne(upTo(user, onOrBefore))
        .sort({ date: -1, createdAt: -1 })
        .lean<Stored<ISleepLog>>()
        .exec();
      return doc ? toSleepLog(doc) : null;
    });
  }
}

export class MongoMealLogRepository implements EventRepository<MealLog> {
  create(event: NewEvent<MealLog>): Promise<MealLog> {
    return withStorage("meals.create", async () => toMealLog(await MealLogModel.create(event)));
  }

  findById(user: string, id: string): Promise<MealLog | null> {
    return withStorage("meals.findById", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await MealLogModel.findById(id).lean<Stored<IMealLog>>().exec();
      return doc && doc.user === user ? toMealLog(doc) : null;
    });
  }

  replace(user: string, id: string, event: NewEvent<MealLog>): Promise<MealLog | null> {
    return withStorage("meals.replace", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await MealLogModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      doc.overwrite({ ...event });
      await doc.save();
      return toMealLog(doc);
    });
  }

  remove(user: string, id: string): Promise<MealLog | null> {
    return withStorage("meals.remove", async () => {
      if (!isObjectIdOrHexString(id)) return null;
      const doc = await MealLogModel.findById(id).exec();
      if (!doc || doc.user !== user) return null;
      await doc.deleteOne();
      return toMealLog(doc);
    });
  }

  list(user: string, from: CalendarDay, to: CalendarDay): Promise<MealLog[]> {
    return withStorage("meals.list", async () => {
      const docs = await MealLogModel.find({ user, date: { $gte: from, $lte: to } })
        .sort({ date: 1, createdAt: 1 })
        .lean<Stored<IMealLog>[]>()
        .exec();
      return docs.map(toMealLog);
    });
  }

  latest(user: string, onOrBefore?: CalendarDay): Promise<MealLog | null> {
    return withStorage("meals.latest", async () => {
      const doc = await MealLogModel.findOne(upTo(user, onOrBefore))
        .sort({ date: -1, createdAt: -1 })
        .lean<Stored<IMealLog>>()
        .exec();
      return doc ? toMealLog(doc) : null;
    });
  }
}

function toProfile(doc: IUserProfile & { updatedAt: Date }): UserProfile {
  return {
    user: doc.user,
    heightCm: doc.heightCm,
    birthDate: doc.birthDate,
    sex: doc.sex,
    activityLevel: doc.activityLevel,
    updatedAt: doc.updatedAt,
  };
}

export class MongoProfileRepository implements ProfileRepository {
  find(user: string): Promise<UserProfile | null> {
    return withStorage("profiles.find", async () => {
      const doc = await UserProfileModel.findOne({ user }).lean<IUserProfile & { updatedAt: Date }>().exec();
      return doc ? toProfile(doc) : null;
    });
  }

  upsert(profile: ProfileFields): Promise<UserProfile> {
    return withStorage("profiles.upsert", async () => {
      const { user, ...fields } = profile;
      const doc = await UserProfileModel.findOneAndUpdate(
        { user },
        { $set: fields },
        { upsert: true, new: true, runValidators: true },
      )
        .lean<IUserProfile & { updatedAt: Date }>()
        .exec();
      if (!doc) throw new Error(`upsert returned no profile for ${user}`);
      return toProfile(doc);
    });
  }
}

export function mongoRepositories() {
  return {
    profiles: new MongoProfileRepository(),
    bodyMeasurements: new MongoBodyMeasurementRepository(),
    exercises: new MongoExerciseLogRepository(),
    sleepLogs: new MongoSleepLogRepository(),
    meals: new MongoMealLogRepository(),
  };
}
