// src/services/macroEstimator.ts
// Placeholder macro estimation for the analyze endpoint.
// None of these look at what is actually in the photo.

import type { BowlSize, Calibration, EstimatorName, Macros } from "../domain/types";

export interface EstimateInput {
  /** Macro values the client already supplied; any subset. */
  hints: Partial<Macros>;
  bowlSize?: BowlSize;
  /** Percentage of a full bowl, 100 when omitted. */
  portion?: number;
  image?: Buffer;
  calibration: Calibration | null;
}

export interface MacroEstimator {
  readonly name: EstimatorName;
  /** Null when this estimator doesn't apply to the input. */
  estimate(input: EstimateInput): Macros | null;
}

export const DEFAULT_MACROS: Macros = { calories: 250, protein: 12, carbs: 30, fats: 8 };

// Used for image estimates when the account never calibrated
export const DEFAULT_BOWL_FACTORS: Calibration = { small: 0.75, medium: 1.0, large: 1.4 };

const round1 = (n: number) => Math.round(n * 10) / 10;

function withDefaults(hints: Partial<Macros>): Macros {
  return {
    calories: hints.calories ?? DEFAULT_MACROS.calories,
    protein: hints.protein ?? DEFAULT_MACROS.protein,
    carbs: hints.carbs ?? DEFAULT_MACROS.carbs,
    fats: hints.fats ?? DEFAULT_MACROS.fats,
  };
}

function scale(macros: Macros, factor: number): Macros {
  return {
    calories: Math.round(macros.calories * factor),
    protein: round1(macros.protein * factor),
    carbs: round1(macros.carbs * factor),
    fats: round1(macros.fats * factor),
  };
}

function hasHints(hints: Partial<Macros>): boolean {
  return Object.values(hints).some((v) => v !== undefined);
}

/**
 * Client hints where given, fixed defaults (250 kcal / 12 / 30 / 8) elsewhere.
 */
export const fixedDefaultEstimator: MacroEstimator = {
  name: "fixed-default",
  estimate: ({ hints }) => {
    const m = withDefaults(hints);
    return { ...m, calories: Math.round(m.calories) };
  },
};

/**
 * Hints scaled by `calibration[bowlSize] * portion / 100`.
 */
export const calibratedScaleEstimator: MacroEstimator = {
  name: "calibrated-scale",
  estimate: ({ hints, bowlSize, portion = 100, calibration }) => {
    if (!calibration || !bowlSize || !hasHints(hints)) return null;
    return scale(withDefaults(hints), (calibration[bowlSize] * portion) / 100);
  },
};

/**
 * Byte-length modulo arithmetic over the decoded image, scaled by the bowl
 * factor and portion.
 */
export const imageHeuristicEstimator: MacroEstimator = {
  name: "image-heuristic",
  estimate: ({ image, bowlSize = "medium", portion = 100, calibration }) => {
    if (!image || image.length === 0) return null;
    const n = image.length;
    const base: Macros = {
      calories: 150 + (n % 450),
      protein: 5 + (n % 25),
      carbs: 15 + (n % 60),
      fats: 3 + (n % 20),
    };
    const factors = calibration ?? DEFAULT_BOWL_FACTORS;
    return scale(base, (factors[bowlSize] * portion) / 100);
  },
};

export const DEFAULT_ESTIMATORS: readonly MacroEstimator[] = [
  imageHeuristicEstimator,
  calibratedScaleEstimator,
  fixedDefaultEstimator,
];

/**
 * First estimator in `chain` that applies wins.
 */
export function estimateMacros(
  input: EstimateInput,
  chain: readonly MacroEstimator[] = DEFAULT_ESTIMATORS
): { macros: Macros; estimator: EstimatorName } {
  for (const estimator of chain) {
    const macros = estimator.estimate(input);
    if (macros) return { macros, estimator: estimator.name };
  }
  // The chain ends in fixed-default unless a caller swapped it out
  return { macros: fixedDefaultEstimator.estimate(input) ?? DEFAULT_MACROS, estimator: "fixed-default" };
}
