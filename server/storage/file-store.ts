import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
  Account,
  NewAccount,
  NewProgressEntry,
  Profile,
  ProfileData,
  ProgressEntry,
} from "../types/domain";
import { compareNewestFirst, isRecord, rowToAccount, rowToProfile, rowToProgressEntry } from "./rows";
import { guardStore, type FitnessStore } from "./types";

const ACCOUNTS_FILE = "users.json";

export function profileFileName(userId: number | string): string {
  return `${userId}_profile.json`;
}

export function progressFileName(userId: number | string): string {
  return `${userId}_progress.json`;
}

/**
 * Per-user JSON documents under one directory. Accounts live in a shared
 * users.json so the file deployment covers the full store contract.
 * Writes are queued so read-modify-write cycles never interleave.
 */
export class FileStore implements FitnessStore {
  readonly mode = "file" as const;

  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(private readonly dir: string) {}

  createAccount(input: NewAccount): Promise<number | null> {
    return guardStore("createAccount", null, () =>
      this.serialize(async () => {
        const accounts = await this.readAccounts();
        if (accounts.some((a) => a.username === input.username || a.email === input.email)) {
          console.error(`[store] createAccount rejected: duplicate username or email`);
          return null;
        }
        const id = accounts.reduce((max, a) => Math.max(max, a.id), 0) + 1;
        accounts.push({
          id,
          username: input.username,
          email: input.email,
          passwordHash: input.passwordHash,
          createdAt: new Date().toISOString(),
          lastLogin: null,
          isActive: true,
        });
        await this.writeJson(ACCOUNTS_FILE, accounts);
        return id;
      })
    );
  }

  getAccountById(id: number): Promise<Account | null> {
    return this.findAccount("getAccountById", (a) => a.id === id);
  }

  getAccountByUsername(username: string): Promise<Account | null> {
    return this.findAccount("getAccountByUsername", (a) => a.username === username);
  }

  getAccountByEmail(email: string): Promise<Account | null> {
    return this.findAccount("getAccountByEmail", (a) => a.email === email);
  }

  updateLastLogin(id: number): Promise<boolean> {
    return this.updateAccount("updateLastLogin", id, (a) => ({ ...a, lastLogin: new Date().toISOString() }));
  }

  setAccountActive(id: number, active: boolean): Promise<boolean> {
    return this.updateAccount("setAccountActive", id, (a) => ({ ...a, isActive: active }));
  }

  getProfile(userId: number): Promise<Profile | null> {
    return guardStore("getProfile", null, async () => {
      const raw = await this.readJson(profileFileName(userId));
      return isRecord(raw) ? rowToProfile(raw) : null;
    });
  }

  saveProfile(userId: number, data: ProfileData): Promise<Profile | null> {
    return guardStore("saveProfile", null, () =>
      this.serialize(async () => {
        if (!(await this.hasAccount(userId))) {
          console.error(`[store] saveProfile rejected: unknown account ${userId}`);
          return null;
        }
        const profile: Profile = { ...data, userId, updatedAt: new Date().toISOString() };
        await this.writeJson(profileFileName(userId), profile);
        return profile;
      })
    );
  }

  addProgressEntry(userId: number, entry: NewProgressEntry): Promise<ProgressEntry | null> {
    return guardStore("addProgressEntry", null, () =>
      this.serialize(async () => {
        if (!(await this.hasAccount(userId))) {
          console.error(`[store] addProgressEntry rejected: unknown account ${userId}`);
          return null;
        }
        const history = await this.readProgress(userId);
        const saved: ProgressEntry = {
          id: history.reduce((max, e) => Math.max(max, e.id), 0) + 1,
          userId,
          date: entry.date,
          weight: entry.weight,
          bodyFat: entry.bodyFat ?? null,
          waist: entry.waist ?? null,
          chest: entry.chest ?? null,
          arms: entry.arms ?? null,
          notes: entry.notes ?? "",
          createdAt: new Date().toISOString(),
        };
        history.push(saved);
        await this.writeJson(progressFileName(userId), history);
        return saved;
      })
    );
  }

  getProgressHistory(userId: number): Promise<ProgressEntry[]> {
    return guardStore("getProgressHistory", [], async () => {
      const history = await this.readProgress(userId);
      return history.sort(compareNewestFirst);
    });
  }

  async getLatestProgress(userId: number): Promise<ProgressEntry | null> {
    const history = await this.getProgressHistory(userId);
    return history[0] ?? null;
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(fn);
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private findAccount(op: string, match: (a: Account) => boolean): Promise<Account | null> {
    return guardStore(op, null, async () => {
      const accounts = await this.readAccounts();
      return accounts.find(match) ?? null;
    });
  }

  private updateAccount(op: string, id: number, change: (a: Account) => Account): Promise<boolean> {
    return guardStore(op, false, () =>
      this.serialize(async () => {
        const accounts = await this.readAccounts();
        const idx = accounts.findIndex((a) => a.id === id);
        if (idx === -1) return false;
        accounts[idx] = change(accounts[idx]);
        await this.writeJson(ACCOUNTS_FILE, accounts);
        return true;
      })
    );
  }

  private async hasAccount(id: number): Promise<boolean> {
    const accounts = await this.readAccounts();
    return accounts.some((a) => a.id === id);
  }

  private async readAccounts(): Promise<Account[]> {
    const raw = await this.readJson(ACCOUNTS_FILE);
    return Array.isArray(raw) ? raw.filter(isRecord).map(rowToAccount) : [];
  }

  private async readProgress(userId: number): Promise<ProgressEntry[]> {
    const raw = await this.readJson(progressFileName(userId));
    return Array.isArray(raw) ? raw.filter(isRecord).map(rowToProgressEntry) : [];
  }

  private async readJson(name: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.dir, name), "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  private async writeJson(name: string, value: unknown): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = path.join(this.dir, name);
    const tmp = `${target}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(value, null, 4), "utf8");
    await fs.rename(tmp, target);
  }
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}
