// ─── Tables ───────────────────────────────────────────────
// SQLite does not enforce VARCHAR lengths; the request schemas do.
export const SCHEMA_SQL = `
  CREATE TABLE users (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    username    VARCHAR(50) NOT NULL UNIQUE,
    role        VARCHAR(20) DEFAULT 'user',
    created_at  DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE posts (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    title       VARCHAR(100) NOT NULL,
    body        TEXT NOT NULL,
    user_id     INTEGER NOT NULL,
    created_at  DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE follows (
    following_user_id  INTEGER,
    followed_user_id   INTEGER,
    created_at         DATETIME DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (following_user_id, followed_user_id),
    FOREIGN KEY (following_user_id) REFERENCES users(id),
    FOREIGN KEY (followed_user_id) REFERENCES users(id)
  );
`;

export const USERNAME_MAX = 50;
export const ROLE_MAX = 20;
export const TITLE_MAX = 100;
export const DEFAULT_ROLE = "user";
