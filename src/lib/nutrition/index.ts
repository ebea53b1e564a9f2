import { getNutritionSourceName } from "../config";
import type { CompletionClient } from "../llm-providers/types";
import { ModelNutritionCalculator } from "./model-calculator";
import { StaticNutritionEstimator } from "./static-estimator";
import type { NutritionSource } from "./types";

export type { NutritionSource } from "./types";
export { ModelNutritionCalculator } from "./model-calculator";
export { StaticNutritionEstimator } from "./static-estimator";

export function getNutritionSource(client: CompletionClient | null): NutritionSource {
  switch (getNutritionSourceName()) {
    case "static":
      return new StaticNutritionEstimator();
    case "model":
      return new ModelNutritionCalculator(client);
  }
}
