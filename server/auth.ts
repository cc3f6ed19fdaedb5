import bcrypt from "bcryptjs";
import type { FitnessStore } from "./storage/types";
import type { Account, PublicAccount } from "./types/domain";

export const SALT_ROUNDS = 12;
export const MIN_PASSWORD_LENGTH = 8;

const USERNAME_MIN = 3;
const USERNAME_MAX = 20;
const USERNAME_REGEX = /^[a-zA-Z0-9_]+$/;
const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const INVALID_CREDENTIALS = "Invalid credentials";

export type FieldCheck = { ok: true } | { ok: false; message: string };

export interface RegisterResult {
  ok: boolean;
  message: string;
  accountId: number | null;
}

export interface LoginResult {
  ok: boolean;
  message: string;
  account: PublicAccount | null;
}

export interface AuthOptions {
  saltRounds?: number;
}

const PASS: FieldCheck = { ok: true };

function fail(message: string): FieldCheck {
  return { ok: false, message };
}

export function validateUsername(username: string): FieldCheck {
  if (!username) return fail("Username is required");
  if (username.length < USERNAME_MIN) return fail(`Username must be at least ${USERNAME_MIN} characters`);
  if (username.length > USERNAME_MAX) return fail(`Username must be less than ${USERNAME_MAX} characters`);
  if (!USERNAME_REGEX.test(username)) return fail("Username can only contain letters, numbers, and underscores");
  return PASS;
}

export function validateEmail(email: string): FieldCheck {
  if (!email) return fail("Email is required");
  if (!EMAIL_REGEX.test(email)) return fail("Invalid email format");
  return PASS;
}

export function validatePassword(password: string): FieldCheck {
  if (!password) return fail("Password is required");
  if (password.length < MIN_PASSWORD_LENGTH) return fail(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  if (!/[A-Za-z]/.test(password)) return fail("Password must contain at least one letter");
  if (!/[0-9]/.test(password)) return fail("Password must contain at least one number");
  return PASS;
}

export async function hashPassword(password: string, saltRounds: number = SALT_ROUNDS): Promise<string> {
  return bcrypt.hash(password, saltRounds);
}

export async function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  try {
    return await bcrypt.compare(password, passwordHash);
  } catch (err) {
    console.error("[auth] password hash could not be verified:", err);
    return false;
  }
}

export function toPublicAccount(account: Account): PublicAccount {
  const { passwordHash: _, ...rest } = account;
  return rest;
}

export async function register(
  store: FitnessStore,
  username: string,
  email: string,
  password: string,
  options: AuthOptions = {},
): Promise<RegisterResult> {
  for (const check of [validateUsername(username), validateEmail(email), validatePassword(password)]) {
    if (!check.ok) return { ok: false, message: check.message, accountId: null };
  }

  if (await store.getAccountByUsername(username)) {
    return { ok: false, message: "Username already exists", accountId: null };
  }
  if (await store.getAccountByEmail(email)) {
    return { ok: false, message: "Email already registered", accountId: null };
  }

  const passwordHash = await hashPassword(password, options.saltRounds ?? SALT_ROUNDS);
  const accountId = await store.createAccount({ username, email, passwordHash });
  if (accountId == null) {
    return { ok: false, message: "Registration failed. Please try again.", accountId: null };
  }

  console.log(`[auth] registered account ${accountId}`);
  return { ok: true, message: "Registration successful", accountId };
}

export async function login(
  store: FitnessStore,
  identifier: string,
  password: string,
): Promise<LoginResult> {
  if (!identifier || !password) {
    return { ok: false, message: "Username/email and password are required", account: null };
  }

  const account =
    (await store.getAccountByUsername(identifier)) ?? (await store.getAccountByEmail(identifier));

  if (!account || !(await verifyPassword(password, account.passwordHash))) {
    return { ok: false, message: INVALID_CREDENTIALS, account: null };
  }

  if (!account.isActive) {
    return { ok: false, message: "Account is disabled", account: null };
  }

  if (!(await store.updateLastLogin(account.id))) {
    console.error(`[auth] last-login update failed for account ${account.id}`);
  }
  const refreshed = (await store.getAccountById(account.id)) ?? account;
  return { ok: true, message: "Login successful", account: toPublicAccount(refreshed) };
}

export async function deactivate(store: FitnessStore, accountId: number): Promise<boolean> {
  const ok = await store.setAccountActive(accountId, false);
  if (ok) console.log(`[auth] deactivated account ${accountId}`);
  return ok;
}

export async function getAccount(store: FitnessStore, accountId: number): Promise<PublicAccount | null> {
  const account = await store.getAccountById(accountId);
  return account ? toPublicAccount(account) : null;
}
