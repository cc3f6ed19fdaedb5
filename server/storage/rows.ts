import { ACTIVITY_LEVELS, type ActivityLevel, type Gender } from "../../lib/body-metrics";
import {
  DIET_PREFERENCES,
  EXPERIENCE_LEVELS,
  FITNESS_GOALS,
  type Account,
  type Profile,
  type ProgressEntry,
} from "../types/domain";
import { dateToStr, numOrNull, tsToStr } from "./types";

const GENDERS: Gender[] = ["Male", "Female"];

export function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function oneOf<T extends string>(val: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === val) ?? fallback;
}

function num(val: unknown): number {
  return numOrNull(val) ?? 0;
}

export function rowToAccount(row: Record<string, unknown>): Account {
  return {
    id: num(row.id),
    username: String(row.username),
    email: String(row.email),
    passwordHash: String(row.passwordHash),
    createdAt: tsToStr(row.createdAt) ?? "",
    lastLogin: tsToStr(row.lastLogin),
    isActive: row.isActive == null ? true : Boolean(row.isActive),
  };
}

export function rowToProfile(row: Record<string, unknown>): Profile {
  const activityLevel: ActivityLevel = oneOf(row.activityLevel, ACTIVITY_LEVELS, "Sedentary (little or no exercise)");
  return {
    userId: num(row.userId),
    name: String(row.name ?? ""),
    age: num(row.age),
    gender: oneOf(row.gender, GENDERS, "Male"),
    height: num(row.height),
    weight: num(row.weight),
    goalWeight: num(row.goalWeight),
    goal: oneOf(row.goal, FITNESS_GOALS, "Maintenance"),
    experience: oneOf(row.experience, EXPERIENCE_LEVELS, "Beginner"),
    activityLevel,
    dietPreference: oneOf(row.dietPreference, DIET_PREFERENCES, "Vegetarian"),
    bmi: num(row.bmi),
    bmr: num(row.bmr),
    tdee: num(row.tdee),
    profileComplete: Boolean(row.profileComplete),
    updatedAt: tsToStr(row.updatedAt) ?? "",
  };
}

export function rowToProgressEntry(row: Record<string, unknown>): ProgressEntry {
  return {
    id: num(row.id),
    userId: num(row.userId),
    date: dateToStr(row.date),
    weight: num(row.weight),
    bodyFat: numOrNull(row.bodyFat),
    waist: numOrNull(row.waist),
    chest: numOrNull(row.chest),
    arms: numOrNull(row.arms),
    notes: row.notes == null ? "" : String(row.notes),
    createdAt: tsToStr(row.createdAt) ?? "",
  };
}

export function compareNewestFirst(a: ProgressEntry, b: ProgressEntry): number {
  const byDate = b.date.localeCompare(a.date);
  return byDate !== 0 ? byDate : b.id - a.id;
}
