import { BmrFormula } from "./enums/bmrFormulaEnum";
import type { LoggedEvent } from "./LoggedEventInterface";

export interface BodyMeasurement extends LoggedEvent {
  weight: number;
  bodyFatPercent?: number;
  muscleMass?: number;
  // metabolic values cached at save time
  bmr: number;
  tdee: number;
  formulaUsed: BmrFormula;
}
