import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RequestInit, Response } from "undici";
import { vi } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { Logger, MetricsRegistry } from "../observability";

export type RouteHandler = (init: RequestInit) => Response | Promise<Response>;

export const testConfig: AppConfig = {
  ...DEFAULT_CONFIG,
  apiBaseUrl: "https://api.example.test/v2",
  progressMode: "none",
  logLevel: "error",
};

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", minLevel: "error" });
}

export function makeTempDir(prefix = "attention-fetch-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function md5Hex(content: string | Buffer): string {
  return crypto.createHash("md5").update(content).digest("hex");
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function createFakeFetch(routes: Record<string, RouteHandler>) {
  return vi.fn(async (url: string, init: RequestInit): Promise<Response> => {
    const handler = routes[`${init.method ?? "GET"} ${url}`];
    if (!handler) {
      return new Response("not found", { status: 404 });
    }
    return handler(init);
  });
}

export function hangUntilAborted(init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
  });
}

export function testDeps() {
  return {
    config: testConfig,
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
  };
}
