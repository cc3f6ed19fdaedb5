import {
  EXERCISES,
  exercisePool,
  generateWorkout,
  sampleWithoutReplacement,
  targetExerciseCount,
} from "../workout-generator";

const first = () => 0;
const NOW = new Date("2026-10-19T10:00:00Z");

describe("targetExerciseCount", () => {
  test("is one exercise per 10 minutes, at least 4, at most the pool size", () => {
    expect(targetExerciseCount(45, 8)).toBe(4);
    expect(targetExerciseCount(20, 8)).toBe(4);
    expect(targetExerciseCount(60, 8)).toBe(6);
    expect(targetExerciseCount(95, 8)).toBe(8);
    expect(targetExerciseCount(30, 2)).toBe(2);
  });
});

describe("sampleWithoutReplacement", () => {
  test("never returns more than the pool holds", () => {
    expect(sampleWithoutReplacement([1, 2, 3], 10, first)).toEqual([1, 2, 3]);
    expect(sampleWithoutReplacement([1, 2, 3], 0, first)).toEqual([]);
  });

  test("swaps from the tail when the draw is high", () => {
    expect(sampleWithoutReplacement(["a", "b", "c"], 1, () => 0.99)).toEqual(["c"]);
  });

  test("returns distinct items under Math.random", () => {
    for (let i = 0; i < 50; i++) {
      const picked = sampleWithoutReplacement(EXERCISES.home.strength.beginner, 5);
      expect(new Set(picked.map((e) => e.name)).size).toBe(5);
    }
  });
});

describe("exercisePool", () => {
  test("picks the pool by workout type", () => {
    expect(exercisePool("gym", "Strength Training", "beginner")).toHaveLength(6);
    expect(exercisePool("gym", "Cardio", "advanced").map((e) => e.name)).toEqual([
      "Sprint Intervals",
      "Assault Bike",
      "Rowing HIIT",
    ]);
    expect(exercisePool("home", "HIIT", "beginner")).toHaveLength(4);
  });

  test("returns a copy the caller can change", () => {
    exercisePool("gym", "Strength Training", "beginner").length = 0;
    exercisePool("gym", "Cardio", "advanced").pop();
    expect(exercisePool("gym", "Strength Training", "beginner")).toHaveLength(6);
    expect(exercisePool("gym", "Cardio", "advanced")).toHaveLength(3);
  });

  test("mixes 3 strength and 2 cardio moves for other types", () => {
    for (const type of ["Mixed", "Yoga", "Flexibility"] as const) {
      expect(exercisePool("home", type, "beginner", first).map((e) => e.name)).toEqual([
        "Push-ups",
        "Bodyweight Squats",
        "Plank",
        "Jumping Jacks",
        "High Knees",
      ]);
    }
  });
});

describe("generateWorkout", () => {
  test("builds a strength session sized by duration", () => {
    const plan = generateWorkout(
      { location: "home", type: "Strength Training", level: "beginner" },
      { random: first, now: NOW },
    );

    expect(plan.date).toBe("2026-10-19");
    expect(plan.location).toBe("Home");
    expect(plan.level).toBe("Beginner");
    expect(plan.duration).toBe(45);
    expect(plan.exercises.map((e) => e.name)).toEqual(["Push-ups", "Bodyweight Squats", "Plank", "Lunges"]);
    expect(plan.warmup).toHaveLength(4);
    expect(plan.cooldown).toHaveLength(5);
  });

  test("returns the whole pool for long sessions", () => {
    const plan = generateWorkout(
      { location: "home", type: "Strength Training", level: "beginner", durationMinutes: 120 },
      { random: first, now: NOW },
    );
    expect(plan.exercises).toHaveLength(8);
  });

  test("samples a mixed session from the combined pool", () => {
    const plan = generateWorkout(
      { location: "home", type: "Mixed", level: "beginner", durationMinutes: 45 },
      { random: first, now: NOW },
    );
    expect(plan.exercises.map((e) => e.name)).toEqual(["Push-ups", "Bodyweight Squats", "Plank", "Jumping Jacks"]);
  });

  test("matches location and level case-insensitively", () => {
    const plan = generateWorkout({ location: "GYM", type: "Cardio", level: "Advanced", durationMinutes: 60 }, { now: NOW });
    expect(plan.location).toBe("Gym");
    expect(plan.level).toBe("Advanced");
    expect(plan.exercises).toHaveLength(3);
  });

  test("rejects unknown locations and levels", () => {
    expect(() => generateWorkout({ location: "park", type: "Cardio", level: "beginner" })).toThrow(RangeError);
    expect(() => generateWorkout({ location: "home", type: "Cardio", level: "elite" })).toThrow(
      'level: must be one of beginner, intermediate, advanced, got "elite"',
    );
  });

  test("returns copies that do not alias the table", () => {
    const plan = generateWorkout(
      { location: "home", type: "Strength Training", level: "beginner" },
      { random: first, now: NOW },
    );
    plan.exercises[0].sets = 99;
    expect(EXERCISES.home.strength.beginner[0].sets).not.toBe(99);
  });
});
