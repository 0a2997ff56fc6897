import path from "path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/config";

describe("loadConfig", () => {
  it("falls back to local defaults", () => {
    expect(loadConfig({})).toEqual({
      host: "127.0.0.1",
      port: 8001,
      dbPath: path.resolve("social_network.db"),
      logLevel: "info",
      nodeEnv: "development",
      jsonLimit: "100kb",
      rateLimit: { windowMs: 60_000, max: 5_000 },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      HOST: "0.0.0.0",
      PORT: "9000",
      DB_PATH: "/var/data/social.db",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      RATE_LIMIT_MAX: "10",
      RATE_LIMIT_WINDOW_MS: "1000",
    });

    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(9000);
    expect(config.dbPath).toBe("/var/data/social.db");
    expect(config.logLevel).toBe("debug");
    expect(config.nodeEnv).toBe("production");
    expect(config.rateLimit).toEqual({ windowMs: 1000, max: 10 });
  });

  it("resolves a relative store path against the working directory", () => {
    expect(loadConfig({ DB_PATH: "data/app.db" }).dbPath).toBe(
      path.join(process.cwd(), "data", "app.db"),
    );
  });

  it("ignores numeric values that do not parse", () => {
    expect(loadConfig({ PORT: "abc" }).port).toBe(8001);
    expect(loadConfig({ PORT: "-1" }).port).toBe(8001);
    expect(loadConfig({ PORT: "" }).port).toBe(8001);
    expect(loadConfig({ RATE_LIMIT_MAX: "1.5" }).rateLimit.max).toBe(5_000);
  });

  it("only accepts ports in the TCP range", () => {
    expect(loadConfig({ PORT: "99999" }).port).toBe(8001);
    expect(loadConfig({ PORT: "65536" }).port).toBe(8001);
    expect(loadConfig({ PORT: "65535" }).port).toBe(65535);
    expect(loadConfig({ PORT: "0" }).port).toBe(0);
  });
});
