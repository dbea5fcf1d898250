export enum BmrFormula {
  STANDARD_WEIGHT = "StandardWeightFormula",
  LEAN_MASS = "LeanMassFormula",
}
