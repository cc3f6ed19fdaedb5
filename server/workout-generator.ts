import exerciseTable from "../data/exercises.json";
import { toDateString } from "../lib/format";

export type WorkoutLocation = "home" | "gym";
export type ExerciseCategory = "strength" | "cardio";
export type WorkoutLevel = "beginner" | "intermediate" | "advanced";

export type WorkoutType = "Strength Training" | "Cardio" | "HIIT" | "Yoga" | "Flexibility" | "Mixed";

export const WORKOUT_TYPES: WorkoutType[] = ["Strength Training", "Cardio", "HIIT", "Yoga", "Flexibility", "Mixed"];
export const WORKOUT_LOCATIONS: WorkoutLocation[] = ["home", "gym"];
export const WORKOUT_LEVELS: WorkoutLevel[] = ["beginner", "intermediate", "advanced"];

export interface Exercise {
  name: string;
  sets: number;
  reps: string;
  rest: string;
}

export interface TimedMovement {
  name: string;
  duration: string;
}

export type ExerciseTable = Record<WorkoutLocation, Record<ExerciseCategory, Record<WorkoutLevel, Exercise[]>>>;

export const EXERCISES: ExerciseTable = exerciseTable;

export const WORKOUT_RULES = {
  minutesPerExercise: 10,
  minExercises: 4,
  mixedStrengthPicks: 3,
  mixedCardioPicks: 2,
  defaultDurationMin: 45,
} as const;

const WARMUP: readonly TimedMovement[] = [
  { name: "Arm Circles", duration: "30s" },
  { name: "Leg Swings", duration: "30s each leg" },
  { name: "Torso Twists", duration: "30s" },
  { name: "Light Cardio (Jog in place)", duration: "2 min" },
];

const COOLDOWN: readonly TimedMovement[] = [
  { name: "Walking", duration: "3 min" },
  { name: "Hamstring Stretch", duration: "30s each leg" },
  { name: "Quad Stretch", duration: "30s each leg" },
  { name: "Shoulder Stretch", duration: "30s each arm" },
  { name: "Deep Breathing", duration: "1 min" },
];

export interface WorkoutRequest {
  location: string;
  type: WorkoutType;
  level: string;
  durationMinutes?: number;
}

export interface WorkoutPlan {
  date: string;
  type: WorkoutType;
  location: string;
  level: string;
  duration: number;
  warmup: TimedMovement[];
  exercises: Exercise[];
  cooldown: TimedMovement[];
}

export interface WorkoutOptions {
  random?: () => number;
  now?: Date;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function parseLocation(raw: string): WorkoutLocation {
  const loc = WORKOUT_LOCATIONS.find((l) => l === raw.toLowerCase());
  if (!loc) throw new RangeError(`location: must be one of ${WORKOUT_LOCATIONS.join(", ")}, got "${raw}"`);
  return loc;
}

function parseLevel(raw: string): WorkoutLevel {
  const level = WORKOUT_LEVELS.find((l) => l === raw.toLowerCase());
  if (!level) throw new RangeError(`level: must be one of ${WORKOUT_LEVELS.join(", ")}, got "${raw}"`);
  return level;
}

/** Partial Fisher-Yates: `k` distinct items, never more than the pool holds. */
export function sampleWithoutReplacement<T>(pool: readonly T[], k: number, random: () => number = Math.random): T[] {
  const copy = [...pool];
  const n = Math.min(Math.max(0, k), copy.length);
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (copy.length - i));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, n);
}

export function exercisePool(
  location: WorkoutLocation,
  type: WorkoutType,
  level: WorkoutLevel,
  random: () => number = Math.random,
): Exercise[] {
  const strength = EXERCISES[location].strength[level];
  const cardio = EXERCISES[location].cardio[level];

  if (type === "Strength Training") return [...strength];
  if (type === "Cardio" || type === "HIIT") return [...cardio];
  return [
    ...sampleWithoutReplacement(strength, WORKOUT_RULES.mixedStrengthPicks, random),
    ...sampleWithoutReplacement(cardio, WORKOUT_RULES.mixedCardioPicks, random),
  ];
}

export function targetExerciseCount(durationMinutes: number, poolSize: number): number {
  const byDuration = Math.floor(durationMinutes / WORKOUT_RULES.minutesPerExercise);
  return Math.min(poolSize, Math.max(WORKOUT_RULES.minExercises, byDuration));
}

export function generateWorkout(req: WorkoutRequest, opts: WorkoutOptions = {}): WorkoutPlan {
  const random = opts.random ?? Math.random;
  const location = parseLocation(req.location);
  const level = parseLevel(req.level);
  const duration = req.durationMinutes ?? WORKOUT_RULES.defaultDurationMin;

  const pool = exercisePool(location, req.type, level, random);
  const exercises = sampleWithoutReplacement(pool, targetExerciseCount(duration, pool.length), random);

  return {
    date: toDateString(opts.now ?? new Date()),
    type: req.type,
    location: capitalize(location),
    level: capitalize(level),
    duration,
    warmup: WARMUP.map((m) => ({ ...m })),
    exercises: exercises.map((e) => ({ ...e })),
    cooldown: COOLDOWN.map((m) => ({ ...m })),
  };
}
