import type { ActivityLevel, Gender } from "../../lib/body-metrics";

export type FitnessGoal =
  | "Weight Loss"
  | "Muscle Gain"
  | "Maintenance"
  | "Athletic Performance"
  | "General Fitness";

export type ExperienceLevel = "Beginner" | "Intermediate" | "Advanced";

export type DietPreference = "Vegetarian" | "Non-Vegetarian" | "Vegan" | "Eggetarian";

export const FITNESS_GOALS: FitnessGoal[] = [
  "Weight Loss",
  "Muscle Gain",
  "Maintenance",
  "Athletic Performance",
  "General Fitness",
];

export const EXPERIENCE_LEVELS: ExperienceLevel[] = ["Beginner", "Intermediate", "Advanced"];

export const DIET_PREFERENCES: DietPreference[] = ["Vegetarian", "Non-Vegetarian", "Vegan", "Eggetarian"];

export type Account = {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: string;
  lastLogin: string | null;
  isActive: boolean;
};

export type PublicAccount = Omit<Account, "passwordHash">;

export type NewAccount = {
  username: string;
  email: string;
  passwordHash: string;
};

export type ProfileInput = {
  name: string;
  age: number;
  gender: Gender;
  height: number;
  weight: number;
  goalWeight: number;
  goal: FitnessGoal;
  experience: ExperienceLevel;
  activityLevel: ActivityLevel;
  dietPreference: DietPreference;
};

export type ProfileData = ProfileInput & {
  bmi: number;
  bmr: number;
  tdee: number;
  profileComplete: boolean;
};

export type Profile = ProfileData & {
  userId: number;
  updatedAt: string;
};

export type NewProgressEntry = {
  date: string;
  weight: number;
  bodyFat?: number | null;
  waist?: number | null;
  chest?: number | null;
  arms?: number | null;
  notes?: string;
};

export type ProgressEntry = {
  id: number;
  userId: number;
  date: string;
  weight: number;
  bodyFat: number | null;
  waist: number | null;
  chest: number | null;
  arms: number | null;
  notes: string;
  createdAt: string;
};

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}
