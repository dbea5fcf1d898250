export enum QuantityUnit {
  SERVING = "serving",
  GRAMS = "grams",
  TABLESPOON = "tablespoon",
  TEASPOON = "teaspoon",
  ML = "ml",
  CUP = "cup",
  PIECE = "piece",
}
