import pg from "pg";
import type { QueryResultRow } from "pg";

export interface QueryResultLike<R> {
  rows: R[];
  rowCount: number | null;
}

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResultLike<R>>;
}

export function createPool(connectionString: string): pg.Pool {
  return new pg.Pool({ connectionString });
}

export function asQueryable(pool: pg.Pool): Queryable {
  return {
    query: (text, params) => pool.query(text, params),
  };
}

export async function runMigration(db: Queryable, name: string, sql: string): Promise<void> {
  const { rows } = await db.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await db.query(sql);
  await db.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS users (
      id SERIAL PRIMARY KEY,
      username TEXT UNIQUE NOT NULL,
      email TEXT UNIQUE NOT NULL,
      password_hash TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      last_login TIMESTAMPTZ,
      is_active BOOLEAN NOT NULL DEFAULT TRUE
    );

    CREATE TABLE IF NOT EXISTS profiles (
      id SERIAL PRIMARY KEY,
      user_id INTEGER UNIQUE NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      age INTEGER,
      gender TEXT,
      height DOUBLE PRECISION,
      weight DOUBLE PRECISION,
      goal_weight DOUBLE PRECISION,
      goal TEXT,
      experience TEXT,
      activity_level TEXT,
      diet_preference TEXT,
      bmi DOUBLE PRECISION,
      bmr DOUBLE PRECISION,
      tdee DOUBLE PRECISION,
      profile_complete BOOLEAN NOT NULL DEFAULT FALSE,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS progress (
      id SERIAL PRIMARY KEY,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      date TEXT NOT NULL,
      weight DOUBLE PRECISION NOT NULL,
      body_fat DOUBLE PRECISION,
      waist DOUBLE PRECISION,
      chest DOUBLE PRECISION,
      arms DOUBLE PRECISION,
      notes TEXT NOT NULL DEFAULT '',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await runMigration(
    db,
    "progress_user_date_idx",
    `CREATE INDEX IF NOT EXISTS idx_progress_user_date ON progress(user_id, date)`
  );
}
