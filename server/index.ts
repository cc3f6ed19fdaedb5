import { AiCoach } from "./ai-coach";
import { loadBodyFatPredictor } from "./body-fat";
import type { BodyFatPredictor } from "./body-fat";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { asQueryable, createPool, initDb } from "./db";
import { FileStore } from "./storage/file-store";
import { PgStore } from "./storage/pg-store";
import type { FitnessStore } from "./storage/types";

export interface AppContext {
  config: AppConfig;
  store: FitnessStore;
  bodyFat: BodyFatPredictor;
  coach: AiCoach;
  close(): Promise<void>;
}

async function openStore(config: AppConfig): Promise<{ store: FitnessStore; close: () => Promise<void> }> {
  if (config.storageMode === "postgres" && config.databaseUrl) {
    const pool = createPool(config.databaseUrl);
    const db = asQueryable(pool);
    try {
      await initDb(db);
    } catch (err) {
      await pool.end();
      throw err;
    }
    console.log("[db] postgres store ready");
    return { store: new PgStore(db), close: () => pool.end() };
  }

  console.log(`[store] file store at ${config.dataDir}`);
  return { store: new FileStore(config.dataDir), close: async () => {} };
}

export async function createAppContext(config: AppConfig = loadConfig()): Promise<AppContext> {
  const { store, close } = await openStore(config);
  const bodyFat = await loadBodyFatPredictor(config.modelWeightsPath);
  const coach = new AiCoach({
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
    timeoutMs: config.chatTimeoutMs,
  });
  if (!coach.configured) console.log("[coach] GEMINI_API_KEY not set; chat coach disabled");

  return { config, store, bodyFat, coach, close };
}

export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { register, login, deactivate, getAccount } from "./auth";
export {
  calculateBmi,
  bmiCategory,
  calculateBmr,
  calculateTdee,
  deriveMetrics,
  projectGoalDate,
} from "../lib/body-metrics";
export { navyBodyFat, bodyFatCategory, bodyComposition, loadBodyFatPredictor } from "./body-fat";
export {
  validateProfileInput,
  buildProfile,
  saveProfile,
  getProfile,
  startOnboarding,
  submitPersonalInfo,
  submitGoals,
  submitLifestyle,
  goBack,
  completeOnboarding,
} from "./profile";
export { generateWorkout } from "./workout-generator";
export { generateMealPlan, summarizeMealPlan } from "./meal/meal-planner";
export {
  appendProgress,
  getHistory,
  summarizeProgress,
  chartSeries,
  motivationalMessage,
} from "./progress-tracker";
export { AiCoach } from "./ai-coach";
export { FileStore } from "./storage/file-store";
export { PgStore } from "./storage/pg-store";
export type { FitnessStore } from "./storage/types";
