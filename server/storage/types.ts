import type {
  Account,
  NewAccount,
  NewProgressEntry,
  Profile,
  ProfileData,
  ProgressEntry,
} from "../types/domain";

export type StorageMode = "postgres" | "file";

/**
 * Read/write contract shared by the relational and flat-file deployments.
 *
 * Storage failures never escape: they are logged and reported as `null`,
 * `false` or an empty list, so callers only ever branch on the result.
 */
export interface FitnessStore {
  readonly mode: StorageMode;

  createAccount(input: NewAccount): Promise<number | null>;
  getAccountById(id: number): Promise<Account | null>;
  getAccountByUsername(username: string): Promise<Account | null>;
  getAccountByEmail(email: string): Promise<Account | null>;
  updateLastLogin(id: number): Promise<boolean>;
  setAccountActive(id: number, active: boolean): Promise<boolean>;

  getProfile(userId: number): Promise<Profile | null>;
  saveProfile(userId: number, data: ProfileData): Promise<Profile | null>;

  addProgressEntry(userId: number, entry: NewProgressEntry): Promise<ProgressEntry | null>;
  /** Newest first. */
  getProgressHistory(userId: number): Promise<ProgressEntry[]>;
  getLatestProgress(userId: number): Promise<ProgressEntry | null>;
}

export async function guardStore<T>(op: string, fallback: T, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    console.error(`[store] ${op} failed:`, err);
    return fallback;
  }
}

export function tsToStr(val: unknown): string | null {
  if (val == null) return null;
  if (val instanceof Date) return val.toISOString();
  return String(val);
}

export function dateToStr(val: unknown): string {
  if (val instanceof Date) return val.toISOString().slice(0, 10);
  return String(val);
}

export function numOrNull(val: unknown): number | null {
  if (val == null) return null;
  const n = Number(val);
  return Number.isFinite(n) ? n : null;
}
