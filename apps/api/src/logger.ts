import pino from "pino";

// ─── Logger ───────────────────────────────────────────────
// JSON lines in production, pino-pretty while developing.
// Tests run without a transport so no worker thread is left behind.
const env = process.env.NODE_ENV || "development";

export const logger = pino({
  level     : process.env.LOG_LEVEL || "info",
  transport : env !== "production" && env !== "test"
                ? { target: "pino-pretty" }
                : undefined,
});
