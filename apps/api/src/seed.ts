// ─── Seed Data ────────────────────────────────────────────
// Inserted once, when the store file is first created.
// Ids are implied by insertion order (1, 2, 3).
export const SEED_USERS = [
  { username: "juan_dev",       role: "user"  },
  { username: "maria_admin",    role: "admin" },
  { username: "carlos_student", role: "user"  },
] as const;

export const SEED_POSTS = [
  { title: "Mi primer post",      body: "Hola mundo desde la API con SQLite!", user_id: 1 },
  { title: "Segundo post",        body: "Este proyecto está genial",           user_id: 2 },
  { title: "Aprendiendo FastAPI", body: "Es más fácil de lo que pensé",        user_id: 3 },
] as const;

export const SEED_FOLLOWS = [
  { following_user_id: 1, followed_user_id: 2 },
  { following_user_id: 1, followed_user_id: 3 },
  { following_user_id: 2, followed_user_id: 3 },
] as const;
