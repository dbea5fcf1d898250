import { dec } from "../../lib/decimal";
import type { BodyMeasurement } from "../../types/BodyMeasurementInterface";
import { MealType } from "../../types/enums/mealTypeEnum";
import { QuantityUnit } from "../../types/enums/quantityUnitEnum";
import type { LedgerKey } from "../../types/LedgerInterface";
import type { NewEvent } from "../../types/LoggedEventInterface";
import type { CalculatedNutrition, FoodProfile, MealLog } from "../../types/MealLogInterface";
import { InvalidInputError, NotFoundError } from "../../utils/errors";
import type { LedgerAggregator } from "../ledger/aggregator";
import { calculate } from "../nutrition/calculator";
import { ensureDayLedger } from "./dayLedger";
import type { EventRepository } from "./repositories";
import { EventLocks } from "./eventLocks";
import { requireDay, requireRange, requireUser } from "./validation";

export interface MealInput {
  date: string;
  mealType: MealType;
  food: FoodProfile;
  quantity: number;
  unit: QuantityUnit;
}

const NUTRIENT_FIELDS = ["calories", "carbohydrates", "protein", "fat", "sodium", "fiber", "sugar"] as const;

function validateFood(food: FoodProfile): FoodProfile {
  if (food.name.trim() === "") {
    throw new InvalidInputError("food.name must not be empty", "food.name");
  }
  requireRange(food.servingSizeGrams, 0, Number.MAX_SAFE_INTEGER, "food.servingSizeGrams");
  for (const field of NUTRIENT_FIELDS) {
    const value = food[field];
    if (value !== undefined) requireRange(value, 0, Number.MAX_SAFE_INTEGER, `food.${field}`);
  }
  return food;
}

type Contribution = Pick<CalculatedNutrition, "calories" | "carbohydrates" | "protein" | "fat">;

export class MealLogService {
  private readonly locks = new EventLocks();

  constructor(
    private readonly meals: EventRepository<MealLog>,
    private readonly measurements: EventRepository<BodyMeasurement>,
    private readonly ledger: LedgerAggregator,
  ) {}

  private build(user: string, input: MealInput): NewEvent<MealLog> {
    requireDay(input.date);
    const food = validateFood(input.food);
    return {
      user,
      date: input.date,
      mealType: input.mealType,
      food,
      quantity: input.quantity,
      unit: input.unit,
      nutrition: calculate(food, input.quantity, input.unit),
    };
  }

  private async contribute(key: LedgerKey, n: Contribution, sign: 1 | -1): Promise<void> {
    if (sign > 0) await ensureDayLedger(this.ledger, this.measurements, key);
    await this.ledger.applyNutritionContribution(
      key,
      sign * n.calories,
      sign * n.carbohydrates,
      sign * n.protein,
      sign * n.fat,
    );
  }

  async add(user: string, input: MealInput): Promise<MealLog> {
    requireUser(user);
    const saved = await this.meals.create(this.build(user, input));
    await this.contribute({ user, day: saved.date }, saved.nutrition, 1);
    return saved;
  }

  async update(user: string, id: string, input: MealInput): Promise<MealLog> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const previous = await this.get(user, id);
      const next = this.build(user, input);
      const saved = await this.meals.replace(user, id, next);
      if (!saved) throw new NotFoundError(`Meal ${id} not found`);

      if (previous.date === saved.date) {
        const before = previous.nutrition;
        const after = saved.nutrition;
        await this.contribute(
          { user, day: saved.date },
          {
            calories: dec(after.calories).minus(before.calories).toNumber(),
            carbohydrates: dec(after.carbohydrates).minus(before.carbohydrates).toNumber(),
            protein: dec(after.protein).minus(before.protein).toNumber(),
            fat: dec(after.fat).minus(before.fat).toNumber(),
          },
          1,
        );
      } else {
        await this.contribute({ user, day: previous.date }, previous.nutrition, -1);
        await this.contribute({ user, day: saved.date }, saved.nutrition, 1);
      }
      return saved;
    });
  }

  async remove(user: string, id: string): Promise<MealLog> {
    requireUser(user);
    return this.locks.run(user, id, async () => {
      const removed = await this.meals.remove(user, id);
      if (!removed) throw new NotFoundError(`Meal ${id} not found`);
      await this.contribute({ user, day: removed.date }, removed.nutrition, -1);
      return removed;
    });
  }

  async get(user: string, id: string): Promise<MealLog> {
    const found = await this.meals.findById(user, id);
    if (!found) throw new NotFoundError(`Meal ${id} not found`);
    return found;
  }

  list(user: string, day: string): Promise<MealLog[]> {
    const date = requireDay(day);
    return this.meals.list(requireUser(user), date, date);
  }
}
