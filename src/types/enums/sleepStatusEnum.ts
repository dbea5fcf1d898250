export enum SleepStatus {
  BAD = "bad",
  SOSO = "soso",
  GOOD = "good",
  EXCELLENT = "excellent",
  OVERSLEEP = "oversleep",
}
