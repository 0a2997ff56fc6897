import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { SCHEMA_SQL } from "./schema";
import { SEED_FOLLOWS, SEED_POSTS, SEED_USERS } from "./seed";

export type Connection = Database.Database;

// ─── Storage Initializer ──────────────────────────────────
// Runs once at startup. An existing file is left untouched: no
// migration, no re-seeding. Returns true when the store was created.
export function initDatabase(dbPath: string): boolean {
  if (fs.existsSync(dbPath)) return false;

  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);

  try {
    db.exec(SCHEMA_SQL);

    const insertUser   = db.prepare("INSERT INTO users (username, role) VALUES (?, ?)");
    const insertPost   = db.prepare("INSERT INTO posts (title, body, user_id) VALUES (?, ?, ?)");
    const insertFollow = db.prepare(
      "INSERT INTO follows (following_user_id, followed_user_id) VALUES (?, ?)",
    );

    db.transaction(() => {
      for (const u of SEED_USERS)   insertUser.run(u.username, u.role);
      for (const p of SEED_POSTS)   insertPost.run(p.title, p.body, p.user_id);
      for (const f of SEED_FOLLOWS) insertFollow.run(f.following_user_id, f.followed_user_id);
    })();
  } catch (err) {
    // A half-built file would be mistaken for a valid store on the next start
    db.close();
    fs.rmSync(dbPath, { force: true });
    throw err;
  }

  db.close();
  return true;
}

// ─── Connection Accessor ──────────────────────────────────
// One connection per request. Rows come back as objects keyed by
// column name, and foreign keys are enforced (SQLite defaults to off).
export function openConnection(dbPath: string): Connection {
  const db = new Database(dbPath, { fileMustExist: true });
  db.pragma("foreign_keys = ON");
  return db;
}

export function withConnection<T>(dbPath: string, fn: (db: Connection) => T): T {
  const db = openConnection(dbPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}
