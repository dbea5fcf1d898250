export enum Intensity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
}
