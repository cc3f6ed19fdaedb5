import * as fs from "node:fs/promises";
import { isMale } from "../lib/body-metrics";
import { isRecord } from "./storage/rows";

export const BODY_FAT_FEATURES = [
  "age", "weight", "height", "neck", "chest", "waist",
  "hip", "thigh", "knee", "ankle", "biceps", "forearm", "wrist",
] as const;

export type BodyFatFeature = (typeof BODY_FAT_FEATURES)[number];

export type BodyMeasurements = Partial<Record<BodyFatFeature, number>> & {
  gender: string;
};

export const BODY_FAT_MIN = 5;
export const BODY_FAT_MAX = 50;

const NAVY_DEFAULTS = { height: 170, waist: 85, neck: 37, hip: 95 } as const;

export interface RegressionWeights {
  intercept: number;
  coefficients: Record<BodyFatFeature, number>;
}

export type BodyFatPredictor =
  | { kind: "navy"; predict(m: BodyMeasurements): number }
  | { kind: "regression"; weights: RegressionWeights; predict(m: BodyMeasurements): number };

export type BodyFatCategory = "Essential Fat" | "Athletes" | "Fitness" | "Average" | "Obese";

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

export function clampBodyFat(pct: number): number {
  return clamp(pct, BODY_FAT_MIN, BODY_FAT_MAX);
}

export function navyBodyFat(m: BodyMeasurements): number {
  const height = m.height ?? NAVY_DEFAULTS.height;
  const waist = m.waist ?? NAVY_DEFAULTS.waist;
  const neck = m.neck ?? NAVY_DEFAULTS.neck;

  if (isMale(m.gender)) {
    const girth = waist - neck;
    if (girth <= 0) throw new RangeError("waist must be larger than neck");
    return 495 / (1.0324 - 0.19077 * Math.log10(girth) + 0.15456 * Math.log10(height)) - 450;
  }

  const hip = m.hip ?? NAVY_DEFAULTS.hip;
  const girth = waist + hip - neck;
  if (girth <= 0) throw new RangeError("waist + hip must be larger than neck");
  return 495 / (1.29579 - 0.35004 * Math.log10(girth) + 0.221 * Math.log10(height)) - 450;
}

export function createNavyPredictor(): BodyFatPredictor {
  return {
    kind: "navy",
    predict: (m) => clampBodyFat(navyBodyFat(m)),
  };
}

export function createRegressionPredictor(weights: RegressionWeights): BodyFatPredictor {
  return {
    kind: "regression",
    weights,
    predict: (m) => {
      let y = weights.intercept;
      for (const f of BODY_FAT_FEATURES) {
        y += weights.coefficients[f] * (m[f] ?? 0);
      }
      return clampBodyFat(y);
    },
  };
}

const ZERO_COEFFICIENTS: Record<BodyFatFeature, number> = {
  age: 0, weight: 0, height: 0, neck: 0, chest: 0, waist: 0,
  hip: 0, thigh: 0, knee: 0, ankle: 0, biceps: 0, forearm: 0, wrist: 0,
};

export function parseRegressionWeights(raw: unknown): RegressionWeights | null {
  if (!isRecord(raw) || typeof raw.intercept !== "number" || !isRecord(raw.coefficients)) return null;
  const source = raw.coefficients;
  const coefficients: Partial<Record<BodyFatFeature, number>> = {};
  for (const f of BODY_FAT_FEATURES) {
    const c = source[f];
    if (c === undefined) continue;
    if (typeof c !== "number" || !Number.isFinite(c)) return null;
    coefficients[f] = c;
  }
  return { intercept: raw.intercept, coefficients: { ...ZERO_COEFFICIENTS, ...coefficients } };
}

/**
 * Uses fitted regression weights when a weights file exists at `weightsPath`,
 * otherwise the Navy circumference formula. A malformed weights file is
 * logged and treated as absent.
 */
export async function loadBodyFatPredictor(weightsPath: string): Promise<BodyFatPredictor> {
  let text: string;
  try {
    text = await fs.readFile(weightsPath, "utf8");
  } catch {
    return createNavyPredictor();
  }

  let weights: RegressionWeights | null = null;
  try {
    weights = parseRegressionWeights(JSON.parse(text));
  } catch (err) {
    console.error(`[body-fat] could not parse model weights at ${weightsPath}:`, err);
  }
  if (!weights) {
    console.error(`[body-fat] ignoring invalid model weights at ${weightsPath}`);
    return createNavyPredictor();
  }

  console.log(`[body-fat] using regression model from ${weightsPath}`);
  return createRegressionPredictor(weights);
}

export function bodyFatCategory(pct: number, gender: string): BodyFatCategory {
  const t = isMale(gender) ? [6, 14, 18, 25] : [14, 21, 25, 32];
  if (pct < t[0]) return "Essential Fat";
  if (pct < t[1]) return "Athletes";
  if (pct < t[2]) return "Fitness";
  if (pct < t[3]) return "Average";
  return "Obese";
}

export interface BodyComposition {
  leanMassKg: number;
  fatMassKg: number;
}

export function bodyComposition(weightKg: number, bodyFatPct: number): BodyComposition {
  const leanMassKg = weightKg * (1 - bodyFatPct / 100);
  return { leanMassKg, fatMassKg: weightKg - leanMassKg };
}
