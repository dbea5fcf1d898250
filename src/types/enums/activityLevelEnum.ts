export enum ActivityLevel {
  SEDENTARY = "sedentary",
  LIGHTLY_ACTIVE = "lightlyActive",
  MODERATELY_ACTIVE = "moderatelyActive",
  VERY_ACTIVE = "veryActive",
  EXTRA_ACTIVE = "extraActive",
}
