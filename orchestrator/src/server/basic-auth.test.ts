import { mkdtemp, rm } from "node:fs/promises";
import type { Server } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const originalEnv = { ...process.env };

function buildAuthHeader(user: string, pass: string): string {
  const token = Buffer.from(`${user}:${pass}`).toString("base64");
  return `Basic ${token}`;
}

async function startServer(): Promise<{ server: Server; baseUrl: string }> {
  vi.resetModules();
  await import("./db/migrate");
  const { createApp } = await import("./app");
  const app = createApp();
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to resolve server address");
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

describe.sequential("Basic Auth read-only enforcement", () => {
  let server: Server | null = null;
  let baseUrl = "";
  let tempDir = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "ats-bridge-auth-test-"));
    process.env.DATA_DIR = tempDir;
    process.env.NODE_ENV = "test";
    process.env.LOG_LEVEL = "error";
  });

  afterEach(async () => {
    if (server) {
      await new Promise<void>((resolve) => server?.close(() => resolve()));
      server = null;
    }
    const { closeDb } = await import("./db/index");
    closeDb();
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = "";
    }
    process.env = { ...originalEnv };
  });

  it("allows read-only GETs without auth when Basic Auth is enabled", async () => {
    process.env.BASIC_AUTH_USER = "user";
    process.env.BASIC_AUTH_PASSWORD = "test-password";

    ({ server, baseUrl } = await startServer());

    const healthRes = await fetch(`${baseUrl}/health`);
    expect(healthRes.status).toBe(200);

    const settingsRes = await fetch(`${baseUrl}/api/settings`);
    expect(settingsRes.status).toBe(200);
  });

  it("blocks POST/PATCH without auth when Basic Auth is enabled", async () => {
    process.env.BASIC_AUTH_USER = "user";
    process.env.BASIC_AUTH_PASSWORD = "test-password";

    ({ server, baseUrl } = await startServer());

    const postRes = await fetch(`${baseUrl}/api/migration/cancel`, { method: "POST" });
    expect(postRes.status).toBe(401);
    expect(postRes.headers.get("www-authenticate")).toMatch(/Basic/);

    const patchRes = await fetch(`${baseUrl}/api/settings`, {
      method: "PATCH",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ migrationWebhookUrl: null }),
    });
    expect(patchRes.status).toBe(401);
  });

  it("keeps the webhook trigger behind Basic Auth when no webhook secret is set", async () => {
    process.env.BASIC_AUTH_USER = "user";
    process.env.BASIC_AUTH_PASSWORD = "test-password";
    delete process.env.WEBHOOK_SECRET;

    ({ server, baseUrl } = await startServer());

    const res = await fetch(`${baseUrl}/api/webhook/trigger`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ entities: ["jobs"] }),
    });
    expect(res.status).toBe(401);
    expect(res.headers.get("www-authenticate")).toMatch(/Basic/);
  });

  it("allows writes with valid Basic Auth when enabled", async () => {
    process.env.BASIC_AUTH_USER = "user";
    process.env.BASIC_AUTH_PASSWORD = "test-password";

    ({ server, baseUrl } = await startServer());

    const res = await fetch(`${baseUrl}/api/migration/cancel`, {
      method: "POST",
      headers: { Authorization: buildAuthHeader("user", "test-password") },
    });
    expect(res.status).toBe(409);

    const wrong = await fetch(`${baseUrl}/api/migration/cancel`, {
      method: "POST",
      headers: { Authorization: buildAuthHeader("user", "nope") },
    });
    expect(wrong.status).toBe(401);
  });

  it("does not require auth when Basic Auth is disabled", async () => {
    delete process.env.BASIC_AUTH_USER;
    delete process.env.BASIC_AUTH_PASSWORD;

    ({ server, baseUrl } = await startServer());

    const res = await fetch(`${baseUrl}/api/migration/cancel`, { method: "POST" });
    expect(res.status).toBe(409);
  });

  it("serves the dashboard page", async () => {
    ({ server, baseUrl } = await startServer());

    const res = await fetch(`${baseUrl}/dashboard/`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
  });
});
