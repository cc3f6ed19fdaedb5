import {
  activityMultiplier,
  bmiCategory,
  calculateBmi,
  calculateBmr,
  calculateTdee,
  deriveMetrics,
  isActivityLevel,
  projectGoalDate,
} from "../body-metrics";

describe("calculateBmi", () => {
  test("rounds to two decimals", () => {
    expect(calculateBmi(70, 175)).toBe(22.86);
  });

  test("classifies at the category boundaries", () => {
    expect(bmiCategory(18.4)).toBe("Underweight");
    expect(bmiCategory(18.5)).toBe("Normal");
    expect(bmiCategory(24.99)).toBe("Normal");
    expect(bmiCategory(25)).toBe("Overweight");
    expect(bmiCategory(30)).toBe("Obese");
  });
});

describe("calculateBmr", () => {
  test("uses the +5 offset for men", () => {
    expect(calculateBmr(70, 175, 25, "Male")).toBe(1673.75);
  });

  test("uses the -161 offset for women", () => {
    expect(calculateBmr(60, 165, 30, "Female")).toBe(1320.25);
  });

  test("matches gender case-insensitively", () => {
    expect(calculateBmr(70, 175, 25, "male")).toBe(1673.75);
  });
});

describe("calculateTdee", () => {
  test("multiplies by the activity factor", () => {
    expect(calculateTdee(1700, "Moderately active (3-5 days/week)")).toBe(2635);
  });

  test("falls back to the sedentary factor for unknown labels", () => {
    expect(isActivityLevel("couch")).toBe(false);
    expect(activityMultiplier("couch")).toBe(1.2);
    expect(calculateTdee(1700, "couch")).toBe(2040);
  });
});

describe("deriveMetrics", () => {
  test("computes bmi, bmr and tdee together", () => {
    const m = deriveMetrics({
      weight: 70,
      height: 175,
      age: 25,
      gender: "Male",
      activityLevel: "Sedentary (little or no exercise)",
    });
    expect(m.bmi).toBe(22.86);
    expect(m.bmr).toBe(1673.75);
    expect(m.tdee).toBeCloseTo(2008.5, 2);
  });
});

describe("projectGoalDate", () => {
  const now = new Date("2026-01-01T00:00:00Z");

  test("projects at the requested rate under the cap", () => {
    const p = projectGoalDate(80, 70, 0.5, "Weight Loss", now);
    expect(p.weeklyChangeKg).toBe(0.5);
    expect(p.weeksNeeded).toBe(20);
    expect(p.daysNeeded).toBe(140);
    expect(p.targetDate.toISOString().slice(0, 10)).toBe("2026-05-21");
    expect(p.targetDateLabel).toBe("May 21, 2026");
  });

  test("caps weight loss at 1 kg per week", () => {
    const p = projectGoalDate(80, 70, 2, "Weight Loss", now);
    expect(p.weeklyChangeKg).toBe(1);
    expect(p.weeksNeeded).toBe(10);
    expect(p.daysNeeded).toBe(70);
  });

  test("caps every other goal at 0.5 kg per week", () => {
    const p = projectGoalDate(60, 65, 1, "Muscle Gain", now);
    expect(p.weeklyChangeKg).toBe(0.5);
    expect(p.weeksNeeded).toBe(10);
  });

  test("returns zero weeks for a zero rate", () => {
    const p = projectGoalDate(80, 70, 0, "Weight Loss", now);
    expect(p.weeksNeeded).toBe(0);
    expect(p.daysNeeded).toBe(0);
    expect(p.targetDate.getTime()).toBe(now.getTime());
  });
});
