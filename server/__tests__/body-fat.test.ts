import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  bodyComposition,
  bodyFatCategory,
  clampBodyFat,
  createNavyPredictor,
  createRegressionPredictor,
  loadBodyFatPredictor,
  navyBodyFat,
  parseRegressionWeights,
} from "../body-fat";

describe("navyBodyFat", () => {
  test("uses the male circumference formula", () => {
    const expected = 495 / (1.0324 - 0.19077 * Math.log10(85 - 37) + 0.15456 * Math.log10(175)) - 450;
    expect(navyBodyFat({ gender: "Male", height: 175, waist: 85, neck: 37 })).toBeCloseTo(expected, 10);
    expect(expected).toBeCloseTo(17.7, 0);
  });

  test("uses the female formula with hip and fills defaults", () => {
    const expected = 495 / (1.29579 - 0.35004 * Math.log10(85 + 95 - 37) + 0.221 * Math.log10(170)) - 450;
    expect(navyBodyFat({ gender: "Female" })).toBeCloseTo(expected, 10);
  });

  test("rises with waist and falls with height", () => {
    const base = navyBodyFat({ gender: "Male", height: 175, waist: 85, neck: 37 });
    expect(navyBodyFat({ gender: "Male", height: 175, waist: 90, neck: 37 })).toBeGreaterThan(base);
    expect(navyBodyFat({ gender: "Male", height: 185, waist: 85, neck: 37 })).toBeLessThan(base);
  });

  test("rejects a neck that is not smaller than the waist", () => {
    expect(() => navyBodyFat({ gender: "Male", waist: 40, neck: 40 })).toThrow(RangeError);
  });

  test("clamps predictions to [5, 50]", () => {
    const navy = createNavyPredictor();
    expect(navy.predict({ gender: "Male", height: 190, waist: 60, neck: 40 })).toBe(5);
    expect(clampBodyFat(72)).toBe(50);
  });
});

describe("regression predictor", () => {
  test("treats missing coefficients and features as zero", () => {
    const weights = parseRegressionWeights({ intercept: 10, coefficients: { waist: 0.2 } });
    expect(weights?.coefficients.age).toBe(0);
    if (!weights) throw new Error("weights should parse");

    const model = createRegressionPredictor(weights);
    expect(model.kind).toBe("regression");
    expect(model.predict({ gender: "Male", waist: 90 })).toBeCloseTo(28, 10);
    expect(model.predict({ gender: "Male" })).toBe(10);
  });

  test("clamps regression output", () => {
    const model = createRegressionPredictor({
      intercept: 100,
      coefficients: {
        age: 0, weight: 0, height: 0, neck: 0, chest: 0, waist: 0,
        hip: 0, thigh: 0, knee: 0, ankle: 0, biceps: 0, forearm: 0, wrist: 0,
      },
    });
    expect(model.predict({ gender: "Female" })).toBe(50);
  });

  test("rejects malformed weights", () => {
    expect(parseRegressionWeights(null)).toBeNull();
    expect(parseRegressionWeights({ intercept: "1", coefficients: {} })).toBeNull();
    expect(parseRegressionWeights({ intercept: 1, coefficients: { waist: "big" } })).toBeNull();
  });
});

describe("loadBodyFatPredictor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fitness-model-"));
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("falls back to the navy formula when no weights file exists", async () => {
    const model = await loadBodyFatPredictor(path.join(dir, "missing.json"));
    expect(model.kind).toBe("navy");
  });

  test("falls back and logs when the file is invalid", async () => {
    const file = path.join(dir, "bad.json");
    await fs.writeFile(file, "not json", "utf8");
    const model = await loadBodyFatPredictor(file);
    expect(model.kind).toBe("navy");
    expect(console.error).toHaveBeenCalled();
  });

  test("loads fitted weights", async () => {
    const file = path.join(dir, "model.json");
    await fs.writeFile(file, JSON.stringify({ intercept: -5, coefficients: { waist: 0.3, neck: -0.1 } }), "utf8");
    const model = await loadBodyFatPredictor(file);
    expect(model.kind).toBe("regression");
    expect(model.predict({ gender: "Male", waist: 100, neck: 40 })).toBeCloseTo(21, 10);
  });
});

describe("bodyFatCategory", () => {
  test("uses male thresholds", () => {
    expect(bodyFatCategory(5.9, "Male")).toBe("Essential Fat");
    expect(bodyFatCategory(6, "Male")).toBe("Athletes");
    expect(bodyFatCategory(14, "Male")).toBe("Fitness");
    expect(bodyFatCategory(18, "Male")).toBe("Average");
    expect(bodyFatCategory(25, "Male")).toBe("Obese");
  });

  test("uses female thresholds", () => {
    expect(bodyFatCategory(13.9, "Female")).toBe("Essential Fat");
    expect(bodyFatCategory(20.9, "Female")).toBe("Athletes");
    expect(bodyFatCategory(21, "Female")).toBe("Fitness");
    expect(bodyFatCategory(31.9, "Female")).toBe("Average");
    expect(bodyFatCategory(32, "Female")).toBe("Obese");
  });
});

describe("bodyComposition", () => {
  test("splits weight into lean and fat mass", () => {
    expect(bodyComposition(80, 25)).toEqual({ leanMassKg: 60, fatMassKg: 20 });
  });
});
