import foodTable from "../../data/indian-foods.json";
import { toDateString } from "../../lib/format";
import type { DietPreference } from "../types/domain";

export type MealSlot = "breakfast" | "lunch" | "dinner" | "snacks";
export type DietTag = "vegetarian" | "non-vegetarian" | "vegan" | "eggetarian";
export type MealLabel = "Breakfast" | "Lunch" | "Dinner" | "Snacks";

export interface FoodItem {
  name: string;
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
}

export type FoodTable = Record<MealSlot, Record<DietTag, FoodItem[]>>;

export const FOODS: FoodTable = foodTable;

export const MEAL_SPLIT: Record<MealSlot, { share: number; label: MealLabel }> = {
  breakfast: { share: 0.25, label: "Breakfast" },
  lunch: { share: 0.35, label: "Lunch" },
  dinner: { share: 0.3, label: "Dinner" },
  snacks: { share: 0.1, label: "Snacks" },
};

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const MEAL_SLOTS = Object.keys(MEAL_SPLIT) as MealSlot[];

export const GOAL_CALORIE_ADJUSTMENT = {
  "weight loss": -500,
  "muscle gain": 300,
} as const;

export interface MacroTotals {
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
}

export interface PlannedMeal {
  type: MealLabel;
  targetCalories: number;
  food: FoodItem;
}

export interface MealPlanDay {
  day: number;
  date: string;
  meals: PlannedMeal[];
  totals: MacroTotals;
}

export interface MealPlan {
  dietPreference: string;
  goal: string;
  dailyCalories: number;
  days: MealPlanDay[];
}

export interface MealPlanRequest {
  dietPreference: DietPreference;
  calorieTarget: number;
  numDays?: number;
  goal?: string;
}

export function adjustedDailyCalories(calorieTarget: number, goal: string): number {
  const g = goal.toLowerCase();
  if (g === "weight loss") return calorieTarget + GOAL_CALORIE_ADJUSTMENT["weight loss"];
  if (g === "muscle gain") return calorieTarget + GOAL_CALORIE_ADJUSTMENT["muscle gain"];
  return calorieTarget;
}

/** Non-vegetarian and eggetarian pools include every vegetarian item. Returns a fresh array. */
export function candidatePool(slot: MealSlot, dietPreference: string): FoodItem[] {
  const foods = FOODS[slot];
  switch (dietPreference.toLowerCase()) {
    case "vegetarian":
      return [...foods.vegetarian];
    case "non-vegetarian":
      return [...foods.vegetarian, ...foods["non-vegetarian"]];
    case "vegan":
      return [...(foods.vegan.length > 0 ? foods.vegan : foods.vegetarian)];
    case "eggetarian":
      return [...foods.vegetarian, ...foods.eggetarian];
    default:
      return [];
  }
}

/** Smallest |calories - target|; the first item wins a tie. */
export function closestByCalories(pool: readonly FoodItem[], targetCalories: number): FoodItem | null {
  let best: FoodItem | null = null;
  let bestDiff = Infinity;
  for (const item of pool) {
    const diff = Math.abs(item.calories - targetCalories);
    if (diff < bestDiff) {
      best = item;
      bestDiff = diff;
    }
  }
  return best;
}

function planDay(day: number, date: string, dietPreference: string, dailyCalories: number): MealPlanDay {
  const meals: PlannedMeal[] = [];
  const totals: MacroTotals = { calories: 0, protein: 0, carbs: 0, fat: 0 };

  for (const slot of MEAL_SLOTS) {
    const { share, label } = MEAL_SPLIT[slot];
    const targetCalories = dailyCalories * share;
    const food = closestByCalories(candidatePool(slot, dietPreference), targetCalories);
    if (!food) continue;

    meals.push({ type: label, targetCalories, food: { ...food } });
    totals.calories += food.calories;
    totals.protein += food.protein;
    totals.carbs += food.carbs;
    totals.fat += food.fat;
  }

  return { day, date, meals, totals };
}

export function generateMealPlan(req: MealPlanRequest, now: Date = new Date()): MealPlan {
  const goal = req.goal ?? "Maintenance";
  const numDays = Math.max(0, Math.floor(req.numDays ?? 7));
  const dailyCalories = adjustedDailyCalories(req.calorieTarget, goal);
  const days: MealPlanDay[] = [];
  for (let day = 1; day <= numDays; day++) {
    const date = toDateString(new Date(now.getTime() + (day - 1) * MS_PER_DAY));
    days.push(planDay(day, date, req.dietPreference, dailyCalories));
  }

  return { dietPreference: req.dietPreference, goal, dailyCalories, days };
}

export function summarizeMealPlan(plan: MealPlan): MacroTotals | null {
  if (plan.days.length === 0) return null;
  const sum = plan.days.reduce(
    (acc, d) => ({
      calories: acc.calories + d.totals.calories,
      protein: acc.protein + d.totals.protein,
      carbs: acc.carbs + d.totals.carbs,
      fat: acc.fat + d.totals.fat,
    }),
    { calories: 0, protein: 0, carbs: 0, fat: 0 },
  );
  const n = plan.days.length;
  return {
    calories: sum.calories / n,
    protein: sum.protein / n,
    carbs: sum.carbs / n,
    fat: sum.fat / n,
  };
}
