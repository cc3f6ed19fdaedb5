import type { StorageMode } from "./storage/types";

export interface AppConfig {
  storageMode: StorageMode;
  databaseUrl: string | null;
  dataDir: string;
  modelWeightsPath: string;
  geminiApiKey: string;
  geminiModel: string;
  chatTimeoutMs: number;
}

export const DEFAULT_COACH_MODEL = "gemini-1.5-flash";
export const DEFAULT_COACH_TIMEOUT_MS = 30000;

export const CONFIG_DEFAULTS = {
  dataDir: "user_data",
  modelWeightsPath: "models/bodyfat_model.json",
  geminiModel: DEFAULT_COACH_MODEL,
  chatTimeoutMs: DEFAULT_COACH_TIMEOUT_MS,
} as const;

type Env = Record<string, string | undefined>;

function nonEmpty(val: string | undefined): string | null {
  const trimmed = val?.trim() ?? "";
  return trimmed === "" ? null : trimmed;
}

function positiveInt(val: string | undefined, fallback: number): number {
  const raw = nonEmpty(val);
  if (raw == null) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function storageMode(val: string | undefined, databaseUrl: string | null): StorageMode {
  const raw = nonEmpty(val)?.toLowerCase();
  if (raw === "postgres" || raw === "file") return raw;
  if (raw != null) console.error(`[config] unknown STORAGE_MODE "${raw}", falling back`);
  return databaseUrl ? "postgres" : "file";
}

export function loadConfig(env: Env = process.env): AppConfig {
  const databaseUrl = nonEmpty(env.DATABASE_URL);
  const mode = storageMode(env.STORAGE_MODE, databaseUrl);
  if (mode === "postgres" && !databaseUrl) {
    throw new Error("STORAGE_MODE=postgres requires DATABASE_URL");
  }

  return {
    storageMode: mode,
    databaseUrl,
    dataDir: nonEmpty(env.USER_DATA_DIR) ?? CONFIG_DEFAULTS.dataDir,
    modelWeightsPath: nonEmpty(env.BODYFAT_MODEL_PATH) ?? CONFIG_DEFAULTS.modelWeightsPath,
    geminiApiKey: nonEmpty(env.GEMINI_API_KEY) ?? "",
    geminiModel: nonEmpty(env.GEMINI_MODEL) ?? CONFIG_DEFAULTS.geminiModel,
    chatTimeoutMs: positiveInt(env.CHAT_TIMEOUT_MS, CONFIG_DEFAULTS.chatTimeoutMs),
  };
}
