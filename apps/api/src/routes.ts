import { Router, Request, Response, NextFunction } from "express";
import type {
  FollowWithUsernames,
  HealthResponse,
  PostWithAuthor,
  User,
} from "@social-network/types";
import { withConnection } from "./db";
import { badRequest, fromZodError, sqliteCode } from "./errors";
import { logger } from "./logger";
import { CreatePostSchema, CreateUserSchema, type CreatePostInput, type CreateUserInput } from "./schemas";

const POST_WITH_AUTHOR = `
  SELECT p.*, u.username
  FROM posts p
  JOIN users u ON p.user_id = u.id
`;

export function createRouter(dbPath: string): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ message: "Social Network API is running!", status: "ok" } satisfies HealthResponse);
  });

  router.get("/health", (_req, res) => {
    let db: "ok" | "down" = "ok";
    try {
      withConnection(dbPath, (conn) => conn.prepare("SELECT 1").get());
    } catch (err) {
      logger.warn({ err }, "Store probe failed");
      db = "down";
    }
    res.json({ ok: true, pid: process.pid, ts: Date.now(), db });
  });

  // LIST users — newest first; id breaks ties inside the same second
  router.get("/users", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const users = withConnection(dbPath, (conn) =>
        conn
          .prepare<[], User>("SELECT * FROM users ORDER BY created_at DESC, id DESC")
          .all(),
      );
      res.json(users);
    } catch (err) {
      next(err);
    }
  });

  // CREATE user
  router.post("/users", (req: Request, res: Response, next: NextFunction) => {
    const parsed = CreateUserSchema.safeParse(req.body);
    if (!parsed.success) return next(fromZodError(parsed.error));
    const { username, role }: CreateUserInput = parsed.data;

    try {
      const user = withConnection(dbPath, (conn) => {
        const { lastInsertRowid } = conn
          .prepare("INSERT INTO users (username, role) VALUES (?, ?)")
          .run(username, role);
        return conn
          .prepare<[number | bigint], User>("SELECT * FROM users WHERE id = ?")
          .get(lastInsertRowid);
      });
      if (!user) throw new Error("Created user could not be read back");
      res.json(user);
    } catch (err) {
      if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") {
        return next(badRequest("Username already exists"));
      }
      next(err);
    }
  });

  // LIST posts with author username
  router.get("/posts", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const posts = withConnection(dbPath, (conn) =>
        conn
          .prepare<[], PostWithAuthor>(`${POST_WITH_AUTHOR} ORDER BY p.created_at DESC, p.id DESC`)
          .all(),
      );
      res.json(posts);
    } catch (err) {
      next(err);
    }
  });

  // CREATE post — the foreign key rejects unknown authors
  router.post("/posts", (req: Request, res: Response, next: NextFunction) => {
    const parsed = CreatePostSchema.safeParse(req.body);
    if (!parsed.success) return next(fromZodError(parsed.error));
    const { title, body, user_id }: CreatePostInput = parsed.data;

    try {
      const post = withConnection(dbPath, (conn) => {
        const { lastInsertRowid } = conn
          .prepare("INSERT INTO posts (title, body, user_id) VALUES (?, ?, ?)")
          .run(title, body, user_id);
        return conn
          .prepare<[number | bigint], PostWithAuthor>(`${POST_WITH_AUTHOR} WHERE p.id = ?`)
          .get(lastInsertRowid);
      });
      if (!post) throw new Error("Created post could not be read back");
      res.json(post);
    } catch (err) {
      if (sqliteCode(err) === "SQLITE_CONSTRAINT_FOREIGNKEY") {
        return next(badRequest("User does not exist"));
      }
      next(err);
    }
  });

  // LIST follow edges (read-only; only seeded at init)
  router.get("/follows", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const follows = withConnection(dbPath, (conn) =>
        conn
          .prepare<[], FollowWithUsernames>(
            `SELECT f.*, a.username AS follower_username, b.username AS followed_username
             FROM follows f
             JOIN users a ON a.id = f.following_user_id
             JOIN users b ON b.id = f.followed_user_id
             ORDER BY f.created_at DESC, f.rowid DESC`,
          )
          .all(),
      );
      res.json(follows);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
