import type { FitnessStore } from "./storage/types";
import type { NewProgressEntry, ProgressEntry, ValidationResult } from "./types/domain";
import { inRange, isPositive, isValidDateString } from "./validation";

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

export const MOTIVATION_BANDS: { below: number; message: string }[] = [
  { below: 10, message: "🌱 Every journey begins with a single step. You've got this!" },
  { below: 25, message: "💪 Great start! Keep the momentum going!" },
  { below: 50, message: "🔥 You're making solid progress! Stay consistent!" },
  { below: 75, message: "⭐ Halfway there! Your dedication is paying off!" },
  { below: 90, message: "🚀 Almost there! The finish line is in sight!" },
  { below: Infinity, message: "🏆 Outstanding! You're so close to your goal!" },
];

export interface ProgressSummary {
  startWeight: number;
  currentWeight: number;
  goalWeight: number;
  weightChange: number;
  weightToGoal: number;
  progressPct: number;
  motivation: string;
  entries: number;
}

export interface ChartPoint {
  date: string;
  weight: number;
  bodyFat: number | null;
}

export interface ProgressChart {
  points: ChartPoint[];
  goalLine: { from: string; to: string; weight: number } | null;
}

export interface AppendResult {
  ok: boolean;
  errors: string[];
  entry: ProgressEntry | null;
}

const MEASUREMENT_LABELS = { waist: "Waist", chest: "Chest", arms: "Arms" } as const;

export function validateProgressEntry(e: NewProgressEntry): ValidationResult {
  const errors: string[] = [];
  if (!isValidDateString(e.date)) {
    errors.push(`Date must be a valid YYYY-MM-DD date, got "${e.date}"`);
  }
  if (!inRange(e.weight, 30, 200)) {
    errors.push("Weight must be between 30 and 200 kg");
  }
  if (e.bodyFat != null && !inRange(e.bodyFat, 5, 50)) {
    errors.push("Body fat must be between 5 and 50%");
  }
  for (const key of ["waist", "chest", "arms"] as const) {
    const v = e[key];
    if (v != null && !isPositive(v)) {
      errors.push(`${MEASUREMENT_LABELS[key]} must be a positive number`);
    }
  }
  return { ok: errors.length === 0, errors };
}

export async function appendProgress(
  store: FitnessStore,
  userId: number,
  entry: NewProgressEntry,
): Promise<AppendResult> {
  const check = validateProgressEntry(entry);
  if (!check.ok) return { ok: false, errors: check.errors, entry: null };

  const saved = await store.addProgressEntry(userId, entry);
  if (!saved) return { ok: false, errors: ["Could not save progress. Please try again."], entry: null };
  return { ok: true, errors: [], entry: saved };
}

export function getHistory(store: FitnessStore, userId: number): Promise<ProgressEntry[]> {
  return store.getProgressHistory(userId);
}

export function sortAscending(entries: readonly ProgressEntry[]): ProgressEntry[] {
  return [...entries].sort((a, b) => a.date.localeCompare(b.date) || a.id - b.id);
}

export function progressPercent(startWeight: number, currentWeight: number, goalWeight: number): number {
  if (startWeight === goalWeight) return 100;
  const change = startWeight - currentWeight;
  const pct = goalWeight < startWeight
    ? (change / (startWeight - goalWeight)) * 100
    : (Math.abs(change) / (goalWeight - startWeight)) * 100;
  return clamp(pct, 0, 100);
}

export function motivationalMessage(progressPct: number): string {
  const band = MOTIVATION_BANDS.find((b) => progressPct < b.below);
  return (band ?? MOTIVATION_BANDS[MOTIVATION_BANDS.length - 1]).message;
}

export function summarizeProgress(entries: readonly ProgressEntry[], goalWeight: number | null): ProgressSummary | null {
  if (entries.length === 0) return null;
  const sorted = sortAscending(entries);
  const startWeight = sorted[0].weight;
  const currentWeight = sorted[sorted.length - 1].weight;
  const goal = goalWeight ?? startWeight;
  const progressPct = progressPercent(startWeight, currentWeight, goal);

  return {
    startWeight,
    currentWeight,
    goalWeight: goal,
    weightChange: startWeight - currentWeight,
    weightToGoal: Math.abs(currentWeight - goal),
    progressPct,
    motivation: motivationalMessage(progressPct),
    entries: sorted.length,
  };
}

export function chartSeries(entries: readonly ProgressEntry[], goalWeight: number | null): ProgressChart {
  const sorted = sortAscending(entries);
  const points = sorted.map((e) => ({ date: e.date, weight: e.weight, bodyFat: e.bodyFat }));
  const goalLine = goalWeight != null && points.length > 0
    ? { from: points[0].date, to: points[points.length - 1].date, weight: goalWeight }
    : null;
  return { points, goalLine };
}
