import { ZodError } from "zod";
import type { ApiError } from "@social-network/types";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly issues?: ApiError["issues"],
  ) {
    super(message);
    this.name = "HttpError";
  }

  toJSON(): ApiError {
    return this.issues ? { error: this.message, issues: this.issues } : { error: this.message };
  }
}

export const badRequest = (message: string) => new HttpError(400, message);
export const notFound = () => new HttpError(404, "Not found");

export function fromZodError(err: ZodError): HttpError {
  return new HttpError(
    400,
    "Invalid request body",
    err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
  );
}

// better-sqlite3 throws SqliteError with codes like SQLITE_CONSTRAINT_UNIQUE
export function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// body-parser marks its own failures with a status and a type
export function parserError(err: unknown): HttpError | undefined {
  if (!(err instanceof Error) || !("status" in err) || typeof err.status !== "number") {
    return undefined;
  }
  if ("type" in err && err.type === "entity.parse.failed") {
    return badRequest("Malformed JSON body");
  }
  if (err.status >= 400 && err.status < 500) {
    return new HttpError(err.status, err.message);
  }
  return undefined;
}
