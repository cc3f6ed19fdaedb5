import { fmtLongDate } from "./format";

export type Gender = "Male" | "Female";

export type ActivityLevel =
  | "Sedentary (little or no exercise)"
  | "Lightly active (1-3 days/week)"
  | "Moderately active (3-5 days/week)"
  | "Very active (6-7 days/week)"
  | "Super active (athlete)";

export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  "Sedentary (little or no exercise)": 1.2,
  "Lightly active (1-3 days/week)": 1.375,
  "Moderately active (3-5 days/week)": 1.55,
  "Very active (6-7 days/week)": 1.725,
  "Super active (athlete)": 1.9,
};

export const ACTIVITY_LEVELS = Object.keys(ACTIVITY_MULTIPLIERS) as ActivityLevel[];

export type BmiCategory = "Underweight" | "Normal" | "Overweight" | "Obese";

export const WEEKLY_RATE_CAP_KG = {
  loss: 1.0,
  gain: 0.5,
} as const;

const MS_PER_DAY = 1000 * 60 * 60 * 24;

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

export function isMale(gender: string): boolean {
  return gender.toLowerCase() === "male";
}

export function calculateBmi(weightKg: number, heightCm: number): number {
  const heightM = heightCm / 100;
  return round2(weightKg / (heightM * heightM));
}

export function bmiCategory(bmi: number): BmiCategory {
  if (bmi < 18.5) return "Underweight";
  if (bmi < 25) return "Normal";
  if (bmi < 30) return "Overweight";
  return "Obese";
}

// Mifflin-St Jeor
export function calculateBmr(weightKg: number, heightCm: number, age: number, gender: string): number {
  const base = 10 * weightKg + 6.25 * heightCm - 5 * age;
  return round2(isMale(gender) ? base + 5 : base - 161);
}

const MULTIPLIER_BY_LABEL = new Map<string, number>(Object.entries(ACTIVITY_MULTIPLIERS));

export function isActivityLevel(level: string): level is ActivityLevel {
  return MULTIPLIER_BY_LABEL.has(level);
}

export function activityMultiplier(level: string): number {
  return MULTIPLIER_BY_LABEL.get(level) ?? ACTIVITY_MULTIPLIERS["Sedentary (little or no exercise)"];
}

export function calculateTdee(bmr: number, activityLevel: string): number {
  return round2(bmr * activityMultiplier(activityLevel));
}

export interface DerivedMetrics {
  bmi: number;
  bmr: number;
  tdee: number;
}

export function deriveMetrics(input: {
  weight: number;
  height: number;
  age: number;
  gender: string;
  activityLevel: string;
}): DerivedMetrics {
  const bmr = calculateBmr(input.weight, input.height, input.age, input.gender);
  return {
    bmi: calculateBmi(input.weight, input.height),
    bmr,
    tdee: calculateTdee(bmr, input.activityLevel),
  };
}

export interface GoalProjection {
  targetDate: Date;
  targetDateLabel: string;
  weeksNeeded: number;
  daysNeeded: number;
  weeklyChangeKg: number;
}

/**
 * Projects when the target weight is reached at the requested weekly rate,
 * capped at 1 kg/week for weight loss and 0.5 kg/week for anything else.
 */
export function projectGoalDate(
  currentWeightKg: number,
  targetWeightKg: number,
  weeklyRateKg: number,
  goal: string,
  now: Date = new Date(),
): GoalProjection {
  const diff = Math.abs(currentWeightKg - targetWeightKg);
  const cap = goal.toLowerCase() === "weight loss" ? WEEKLY_RATE_CAP_KG.loss : WEEKLY_RATE_CAP_KG.gain;
  const weeklyChangeKg = Math.min(Math.abs(weeklyRateKg), cap);
  const weeksNeeded = weeklyChangeKg > 0 ? diff / weeklyChangeKg : 0;
  const daysNeeded = Math.floor(weeksNeeded * 7);
  const targetDate = new Date(now.getTime() + daysNeeded * MS_PER_DAY);
  return {
    targetDate,
    targetDateLabel: fmtLongDate(targetDate),
    weeksNeeded,
    daysNeeded,
    weeklyChangeKg,
  };
}
