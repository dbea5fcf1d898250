import { isAfter } from "date-fns";
import { parseCalendarDay } from "../../lib/dayBoundary";
import { ActivityLevel } from "../../types/enums/activityLevelEnum";
import { Sex } from "../../types/enums/sexEnum";
import type { UserProfile } from "../../types/ProfileInterface";
import { InvalidInputError, NotFoundError } from "../../utils/errors";
import type { ProfileRepository } from "./repositories";
import { requireDay, requireRange, requireUser } from "./validation";

export interface ProfileInput {
  heightCm: number;
  birthDate: string;
  sex: Sex;
  activityLevel: ActivityLevel;
}

export const HEIGHT_RANGE_CM = { min: 50, max: 300 } as const;

export class ProfileService {
  constructor(
    private readonly profiles: ProfileRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  find(user: string): Promise<UserProfile | null> {
    return this.profiles.find(requireUser(user));
  }

  async get(user: string): Promise<UserProfile> {
    const profile = await this.find(user);
    if (!profile) throw new NotFoundError(`No profile for user ${user}`);
    return profile;
  }

  async upsert(user: string, input: ProfileInput): Promise<UserProfile> {
    requireUser(user);
    requireRange(input.heightCm, HEIGHT_RANGE_CM.min, HEIGHT_RANGE_CM.max, "heightCm");
    const birthDate = requireDay(input.birthDate, "birthDate");
    if (isAfter(parseCalendarDay(birthDate), this.clock())) {
      throw new InvalidInputError("birthDate cannot be in the future", "birthDate");
    }
    return this.profiles.upsert({
      user,
      heightCm: input.heightCm,
      birthDate,
      sex: input.sex,
      activityLevel: input.activityLevel,
    });
  }
}
