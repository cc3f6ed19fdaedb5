import { register } from "../server/auth";
import { loadConfig } from "../server/config";
import { asQueryable, createPool } from "../server/db";
import { createAppContext } from "../server/index";
import { saveProfile } from "../server/profile";
import { appendProgress } from "../server/progress-tracker";

const SEED_DAYS = 60;
const SEED_USERNAME = "demo_user";
const SEED_EMAIL = "demo@example.com";
const SEED_PASSWORD = "demo-pass-2024";
const SEED_NOTE = "SEED_DATA";

function dateStr(daysAgo: number): string {
  const d = new Date();
  d.setDate(d.getDate() - daysAgo);
  return d.toISOString().slice(0, 10);
}

function rand(min: number, max: number, decimals = 1): number {
  const v = min + Math.random() * (max - min);
  const p = Math.pow(10, decimals);
  return Math.round(v * p) / p;
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

async function clearSeed() {
  const config = loadConfig();
  if (config.storageMode !== "postgres" || !config.databaseUrl) {
    console.log(`File mode: delete ${config.dataDir}/ to remove seeded data.`);
    return;
  }
  console.log("Clearing seeded data...");
  const pool = createPool(config.databaseUrl);
  try {
    const db = asQueryable(pool);
    await db.query(`DELETE FROM progress WHERE notes = $1`, [SEED_NOTE]);
    await db.query(`DELETE FROM users WHERE username = $1`, [SEED_USERNAME]);
  } finally {
    await pool.end();
  }
  console.log("Cleared.");
}

async function seed() {
  const ctx = await createAppContext();
  try {
    console.log(`Seeding ${SEED_DAYS} days of dev data into the ${ctx.store.mode} store...`);

    const reg = await register(ctx.store, SEED_USERNAME, SEED_EMAIL, SEED_PASSWORD);
    const accountId = reg.accountId ?? (await ctx.store.getAccountByUsername(SEED_USERNAME))?.id;
    if (accountId == null) throw new Error(`could not create or find ${SEED_USERNAME}: ${reg.message}`);

    let weight = rand(82, 88, 1);
    let bf = rand(22, 26, 1);

    const profile = await saveProfile(ctx.store, accountId, {
      name: "Demo User",
      age: 29,
      gender: "Male",
      height: 178,
      weight,
      goalWeight: 75,
      goal: "Weight Loss",
      experience: "Intermediate",
      activityLevel: "Moderately active (3-5 days/week)",
      dietPreference: "Vegetarian",
    }, { profileComplete: true });
    if (!profile.ok) throw new Error(`profile: ${profile.errors.join("; ")}`);

    let inserted = 0;
    for (let i = SEED_DAYS; i >= 0; i -= 3) {
      weight = clamp(weight + rand(-0.6, 0.3, 1), 70, 95);
      bf = clamp(bf + rand(-0.3, 0.2, 1), 12, 30);

      const res = await appendProgress(ctx.store, accountId, {
        date: dateStr(i),
        weight,
        bodyFat: bf,
        waist: rand(86, 94, 1),
        chest: rand(98, 104, 1),
        arms: rand(33, 37, 1),
        notes: SEED_NOTE,
      });
      if (res.ok) inserted++;
      else console.error(`[seed] skipped ${dateStr(i)}: ${res.errors.join("; ")}`);
    }

    console.log(`Inserted ${inserted} progress entries for ${SEED_USERNAME}.`);
    console.log("Run 'npm run seed:dev -- --clear' to remove seeded data.");
  } finally {
    await ctx.close();
  }
}

async function main() {
  try {
    if (process.argv.includes("--clear")) {
      await clearSeed();
    } else {
      await seed();
    }
  } catch (err) {
    console.error("Seed error:", err);
    process.exitCode = 1;
  }
}

void main();
