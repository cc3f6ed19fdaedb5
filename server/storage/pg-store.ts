import type { Queryable } from "../db";
import type {
  Account,
  NewAccount,
  NewProgressEntry,
  Profile,
  ProfileData,
  ProgressEntry,
} from "../types/domain";
import { rowToAccount, rowToProfile, rowToProgressEntry } from "./rows";
import { guardStore, type FitnessStore } from "./types";

type Row = Record<string, unknown>;

const ACCOUNT_COLUMNS = `
  id,
  username,
  email,
  password_hash AS "passwordHash",
  created_at AS "createdAt",
  last_login AS "lastLogin",
  is_active AS "isActive"
`;

const PROFILE_COLUMNS = `
  user_id AS "userId",
  name,
  age,
  gender,
  height,
  weight,
  goal_weight AS "goalWeight",
  goal,
  experience,
  activity_level AS "activityLevel",
  diet_preference AS "dietPreference",
  bmi,
  bmr,
  tdee,
  profile_complete AS "profileComplete",
  updated_at AS "updatedAt"
`;

const PROGRESS_COLUMNS = `
  id,
  user_id AS "userId",
  date,
  weight,
  body_fat AS "bodyFat",
  waist,
  chest,
  arms,
  notes,
  created_at AS "createdAt"
`;

export class PgStore implements FitnessStore {
  readonly mode = "postgres" as const;

  constructor(private readonly db: Queryable) {}

  createAccount(input: NewAccount): Promise<number | null> {
    return guardStore("createAccount", null, async () => {
      const { rows } = await this.db.query<Row>(
        `INSERT INTO users (username, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING id`,
        [input.username, input.email, input.passwordHash]
      );
      return rows.length > 0 ? Number(rows[0].id) : null;
    });
  }

  getAccountById(id: number): Promise<Account | null> {
    return this.findAccount("getAccountById", "id", id);
  }

  getAccountByUsername(username: string): Promise<Account | null> {
    return this.findAccount("getAccountByUsername", "username", username);
  }

  getAccountByEmail(email: string): Promise<Account | null> {
    return this.findAccount("getAccountByEmail", "email", email);
  }

  updateLastLogin(id: number): Promise<boolean> {
    return guardStore("updateLastLogin", false, async () => {
      const { rowCount } = await this.db.query(
        `UPDATE users SET last_login = NOW() WHERE id = $1`,
        [id]
      );
      return (rowCount ?? 0) > 0;
    });
  }

  setAccountActive(id: number, active: boolean): Promise<boolean> {
    return guardStore("setAccountActive", false, async () => {
      const { rowCount } = await this.db.query(
        `UPDATE users SET is_active = $2 WHERE id = $1`,
        [id, active]
      );
      return (rowCount ?? 0) > 0;
    });
  }

  getProfile(userId: number): Promise<Profile | null> {
    return guardStore("getProfile", null, async () => {
      const { rows } = await this.db.query<Row>(
        `SELECT ${PROFILE_COLUMNS} FROM profiles WHERE user_id = $1`,
        [userId]
      );
      return rows.length > 0 ? rowToProfile(rows[0]) : null;
    });
  }

  saveProfile(userId: number, data: ProfileData): Promise<Profile | null> {
    return guardStore("saveProfile", null, async () => {
      const { rows } = await this.db.query<Row>(
        `
        INSERT INTO profiles (
          user_id, name, age, gender, height, weight, goal_weight,
          goal, experience, activity_level, diet_preference,
          bmi, bmr, tdee, profile_complete
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
        ON CONFLICT (user_id) DO UPDATE SET
          name = EXCLUDED.name,
          age = EXCLUDED.age,
          gender = EXCLUDED.gender,
          height = EXCLUDED.height,
          weight = EXCLUDED.weight,
          goal_weight = EXCLUDED.goal_weight,
          goal = EXCLUDED.goal,
          experience = EXCLUDED.experience,
          activity_level = EXCLUDED.activity_level,
          diet_preference = EXCLUDED.diet_preference,
          bmi = EXCLUDED.bmi,
          bmr = EXCLUDED.bmr,
          tdee = EXCLUDED.tdee,
          profile_complete = EXCLUDED.profile_complete,
          updated_at = NOW()
        RETURNING ${PROFILE_COLUMNS}
        `,
        [
          userId,
          data.name,
          data.age,
          data.gender,
          data.height,
          data.weight,
          data.goalWeight,
          data.goal,
          data.experience,
          data.activityLevel,
          data.dietPreference,
          data.bmi,
          data.bmr,
          data.tdee,
          data.profileComplete,
        ]
      );
      return rows.length > 0 ? rowToProfile(rows[0]) : null;
    });
  }

  addProgressEntry(userId: number, entry: NewProgressEntry): Promise<ProgressEntry | null> {
    return guardStore("addProgressEntry", null, async () => {
      const { rows } = await this.db.query<Row>(
        `INSERT INTO progress (user_id, date, weight, body_fat, waist, chest, arms, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${PROGRESS_COLUMNS}`,
        [
          userId,
          entry.date,
          entry.weight,
          entry.bodyFat ?? null,
          entry.waist ?? null,
          entry.chest ?? null,
          entry.arms ?? null,
          entry.notes ?? "",
        ]
      );
      return rows.length > 0 ? rowToProgressEntry(rows[0]) : null;
    });
  }

  getProgressHistory(userId: number): Promise<ProgressEntry[]> {
    return guardStore("getProgressHistory", [], async () => {
      const { rows } = await this.db.query<Row>(
        `SELECT ${PROGRESS_COLUMNS} FROM progress
         WHERE user_id = $1
         ORDER BY date DESC, id DESC`,
        [userId]
      );
      return rows.map(rowToProgressEntry);
    });
  }

  getLatestProgress(userId: number): Promise<ProgressEntry | null> {
    return guardStore("getLatestProgress", null, async () => {
      const { rows } = await this.db.query<Row>(
        `SELECT ${PROGRESS_COLUMNS} FROM progress
         WHERE user_id = $1
         ORDER BY date DESC, id DESC
         LIMIT 1`,
        [userId]
      );
      return rows.length > 0 ? rowToProgressEntry(rows[0]) : null;
    });
  }

  private findAccount(op: string, column: "id" | "username" | "email", value: number | string): Promise<Account | null> {
    return guardStore(op, null, async () => {
      const { rows } = await this.db.query<Row>(
        `SELECT ${ACCOUNT_COLUMNS} FROM users WHERE ${column} = $1`,
        [value]
      );
      return rows.length > 0 ? rowToAccount(rows[0]) : null;
    });
  }
}
