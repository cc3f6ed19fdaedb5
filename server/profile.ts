import { deriveMetrics } from "../lib/body-metrics";
import type { ActivityLevel, Gender } from "../lib/body-metrics";
import type { FitnessStore } from "./storage/types";
import type {
  DietPreference,
  ExperienceLevel,
  FitnessGoal,
  Profile,
  ProfileData,
  ProfileInput,
} from "./types/domain";
import { inRange } from "./validation";

export const PROFILE_LIMITS = {
  age: [15, 100],
  weight: [30, 200],
  height: [100, 250],
  goalWeight: [30, 200],
} as const;

export interface SaveProfileResult {
  ok: boolean;
  errors: string[];
  profile: Profile | null;
}

const LIMIT_LABELS = {
  age: ["Age", ""],
  weight: ["Weight", " kg"],
  height: ["Height", " cm"],
  goalWeight: ["Goal weight", " kg"],
} as const;

export function validateProfileInput(input: ProfileInput): string[] {
  const errors: string[] = [];
  if (input.name.trim() === "") errors.push("Name cannot be empty");
  for (const key of ["age", "weight", "height", "goalWeight"] as const) {
    const [lo, hi] = PROFILE_LIMITS[key];
    if (!inRange(input[key], lo, hi)) {
      const [label, unit] = LIMIT_LABELS[key];
      errors.push(`${label} must be between ${lo} and ${hi}${unit}`);
    }
  }
  return errors;
}

export function buildProfile(input: ProfileInput, profileComplete = true): ProfileData {
  return {
    ...input,
    name: input.name.trim(),
    ...deriveMetrics(input),
    profileComplete,
  };
}

export async function saveProfile(
  store: FitnessStore,
  userId: number,
  input: ProfileInput,
  opts: { profileComplete?: boolean } = {},
): Promise<SaveProfileResult> {
  const errors = validateProfileInput(input);
  if (errors.length > 0) return { ok: false, errors, profile: null };

  const existing = await store.getProfile(userId);
  const profileComplete = opts.profileComplete ?? existing?.profileComplete ?? true;
  const profile = await store.saveProfile(userId, buildProfile(input, profileComplete));
  if (!profile) return { ok: false, errors: ["Error saving profile. Please try again."], profile: null };
  return { ok: true, errors: [], profile };
}

export async function getProfile(store: FitnessStore, userId: number): Promise<Profile | null> {
  return store.getProfile(userId);
}

// Onboarding wizard

export interface PersonalInfo {
  name: string;
  age: number;
  gender: Gender;
  height: number;
  weight: number;
}

export interface GoalsInfo {
  goal: FitnessGoal;
  goalWeight: number;
  experience: ExperienceLevel;
}

export interface LifestyleInfo {
  activityLevel: ActivityLevel;
  dietPreference: DietPreference;
}

export type OnboardingStep = 1 | 2 | 3 | "done";

export interface OnboardingState {
  step: OnboardingStep;
  personal: PersonalInfo | null;
  goals: GoalsInfo | null;
  lifestyle: LifestyleInfo | null;
  error: string | null;
}

export function startOnboarding(): OnboardingState {
  return { step: 1, personal: null, goals: null, lifestyle: null, error: null };
}

function outOfStep(state: OnboardingState, expected: OnboardingStep): OnboardingState {
  return { ...state, error: `Expected onboarding step ${expected}, currently at ${state.step}` };
}

export function submitPersonalInfo(state: OnboardingState, info: PersonalInfo): OnboardingState {
  if (state.step !== 1) return outOfStep(state, 1);
  const name = info.name.trim();
  if (name === "") return { ...state, error: "Please enter your name" };
  return { ...state, step: 2, personal: { ...info, name }, error: null };
}

export function submitGoals(state: OnboardingState, info: GoalsInfo): OnboardingState {
  if (state.step !== 2) return outOfStep(state, 2);
  return { ...state, step: 3, goals: { ...info }, error: null };
}

export function submitLifestyle(state: OnboardingState, info: LifestyleInfo): OnboardingState {
  if (state.step !== 3) return outOfStep(state, 3);
  return { ...state, step: "done", lifestyle: { ...info }, error: null };
}

/** Collected answers are kept so moving forward again starts from them. */
export function goBack(state: OnboardingState): OnboardingState {
  switch (state.step) {
    case "done":
      return { ...state, step: 3, error: null };
    case 3:
      return { ...state, step: 2, error: null };
    default:
      return { ...state, step: 1, error: null };
  }
}

export function onboardingInput(state: OnboardingState): ProfileInput | null {
  if (state.step !== "done" || !state.personal || !state.goals || !state.lifestyle) return null;
  return { ...state.personal, ...state.goals, ...state.lifestyle };
}

export async function completeOnboarding(
  store: FitnessStore,
  userId: number,
  state: OnboardingState,
): Promise<SaveProfileResult> {
  const input = onboardingInput(state);
  if (!input) return { ok: false, errors: ["Onboarding is not finished"], profile: null };
  return saveProfile(store, userId, input, { profileComplete: true });
}
