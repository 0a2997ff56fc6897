import { z } from "zod";
import { DEFAULT_ROLE, ROLE_MAX, TITLE_MAX, USERNAME_MAX } from "./schema";

// Limits count characters (code points), not UTF-16 units
const text = (max: number, label: string) =>
  z
    .string()
    .min(1, `${label} is required`)
    .refine((s) => [...s].length <= max, `${label} must be at most ${max} characters`);

// ─── Request Bodies ───────────────────────────────────────
export const CreateUserSchema = z.object({
  username: text(USERNAME_MAX, "Username"),
  role: text(ROLE_MAX, "Role").default(DEFAULT_ROLE),
});

export const CreatePostSchema = z.object({
  title: text(TITLE_MAX, "Title"),
  body: z.string().min(1, "Body is required"),
  user_id: z.number().int().positive(),
});

export type CreateUserInput = z.infer<typeof CreateUserSchema>;
export type CreatePostInput = z.infer<typeof CreatePostSchema>;
