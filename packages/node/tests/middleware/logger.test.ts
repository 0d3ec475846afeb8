/**
 * Tests for request logging and request ids.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { createTestApp } from "../setup.js";

function capture(): { lines: Record<string, unknown>[]; logger: Logger } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { lines, logger };
}

describe("loggerMiddleware", () => {
  it("logs one line per request", async () => {
    const { lines, logger } = capture();
    const { app } = createTestApp({ logger });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      component: "http",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
      msg: "GET /health 200",
    });
  });

  it("logs client errors at warn", async () => {
    const { lines, logger } = capture();
    const { app } = createTestApp({ logger });

    await app.request("/api/v1/mint-preview?amount=x");

    expect(lines.map((l) => l["level"])).toEqual([40]);
  });

  it("can be disabled", async () => {
    const { lines, logger } = capture();
    const { app } = createTestApp({ logger, logRequests: false });

    await app.request("/health");

    expect(lines).toEqual([]);
  });
});

describe("requestIdMiddleware", () => {
  it("echoes a well-formed incoming id", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { "X-Request-Id": "abc-123" } });

    expect(res.headers.get("X-Request-Id")).toBe("abc-123");
  });

  it("replaces a malformed id with a fresh UUID", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { "X-Request-Id": "bad id!" } });

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});
