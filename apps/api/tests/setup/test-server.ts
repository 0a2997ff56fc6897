import fs from "fs";
import os from "os";
import path from "path";
import type { Server } from "http";
import { createApp } from "../../src/app";
import { initDatabase } from "../../src/db";

export interface TestResponse<T = unknown> {
  status: number;
  body: T;
  headers: Headers;
}

export function makeTempDbPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "social-network-"));
  return path.join(dir, "social_network.db");
}

export function removeTempDb(dbPath: string): void {
  fs.rmSync(path.dirname(dbPath), { recursive: true, force: true });
}

// Runs the real Express app on an ephemeral loopback port
export class TestServer {
  private server: Server | null = null;
  private baseUrl = "";

  constructor(readonly dbPath: string) {}

  async start(): Promise<void> {
    initDatabase(this.dbPath);
    const app = createApp({
      dbPath: this.dbPath,
      jsonLimit: "100kb",
      rateLimit: { windowMs: 60_000, max: 10_000 },
    });

    const server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server is not listening on TCP");
    this.server = server;
    this.baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
  }

  async request<T = unknown>(
    method: string,
    urlPath: string,
    options: { body?: unknown; rawBody?: string; headers?: Record<string, string> } = {},
  ): Promise<TestResponse<T>> {
    const headers = new Headers(options.headers);
    let body: string | undefined;
    if (options.rawBody !== undefined) {
      body = options.rawBody;
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
    }
    if (body !== undefined && !headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json");
    }

    const response = await fetch(`${this.baseUrl}${urlPath}`, { method, headers, body });
    const text = await response.text();
    return {
      status: response.status,
      body: text ? JSON.parse(text) : null,
      headers: response.headers,
    };
  }

  get<T = unknown>(urlPath: string, headers?: Record<string, string>) {
    return this.request<T>("GET", urlPath, { headers });
  }

  post<T = unknown>(urlPath: string, body: unknown) {
    return this.request<T>("POST", urlPath, { body });
  }
}
