import { mkdtemp, rm } from "node:fs/promises";
import type { Server } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";

/**
 * Registered after every `vi.resetModules()` so mocked modules and the real
 * modules they spread share one module graph (and one `AppError` class).
 */
function mockServices() {
  vi.doMock("../../pipeline/index", async (importOriginal) => {
    const actual = await importOriginal<typeof import("../../pipeline/index")>();
    return {
      ...actual,
      runMigration: vi.fn().mockResolvedValue({ status: "completed" }),
    };
  });

  vi.doMock("../../services/greenhouse/client", async (importOriginal) => {
    const actual =
      await importOriginal<typeof import("../../services/greenhouse/client")>();
    return { ...actual, getGreenhouseClient: vi.fn() };
  });

  vi.doMock("../../services/greenhouse/export", async (importOriginal) => {
    const actual =
      await importOriginal<typeof import("../../services/greenhouse/export")>();
    return {
      ...actual,
      exportAll: vi.fn().mockResolvedValue([]),
      exportEntity: vi.fn(),
    };
  });

  vi.doMock("../../services/teamtailor/importers", () => ({
    importEntity: vi.fn(),
  }));

  vi.doMock("../../services/teamtailor/users-map", () => ({
    buildUsersMap: vi.fn(),
  }));

  vi.doMock("../../services/teamtailor/analytics", () => ({
    getTeamtailorAnalytics: vi.fn(),
    getAvailableTags: vi.fn(),
    getCandidateTags: vi.fn(),
    addTagsToCandidates: vi.fn(),
  }));

  vi.doMock("../../services/teamtailor/prospects", () => ({
    listProspectPools: vi.fn(),
    getProspectPool: vi.fn(),
    createProspectPool: vi.fn(),
    updateProspectPool: vi.fn(),
    deleteProspectPool: vi.fn(),
    getPoolCandidates: vi.fn(),
    addCandidateToPool: vi.fn(),
    addCandidatesToPool: vi.fn(),
    removeCandidateFromPool: vi.fn(),
    getPoolStats: vi.fn(),
    migrateProspects: vi.fn(),
  }));
}

const originalEnv = { ...process.env };

export async function startServer(options?: {
  env?: Record<string, string | undefined>;
}): Promise<{
  server: Server;
  baseUrl: string;
  closeDb: () => void;
  tempDir: string;
}> {
  vi.resetModules();
  mockServices();
  const tempDir = await mkdtemp(join(tmpdir(), "ats-bridge-api-test-"));
  process.env = {
    ...originalEnv,
    DATA_DIR: tempDir,
    NODE_ENV: "test",
    LOG_LEVEL: "error",
    BASIC_AUTH_USER: undefined,
    BASIC_AUTH_PASSWORD: undefined,
    MIGRATION_WEBHOOK_URL: undefined,
    WEBHOOK_SECRET: undefined,
    ...options?.env,
  };

  await import("../../db/migrate");
  const { createApp } = await import("../../app");
  const { closeDb } = await import("../../db/index");

  const app = createApp();
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to resolve server address");
  }
  return {
    server,
    baseUrl: `http://127.0.0.1:${address.port}`,
    closeDb,
    tempDir,
  };
}

export async function stopServer(args: {
  server: Server;
  closeDb: () => void;
  tempDir: string;
}) {
  await new Promise<void>((resolve) => args.server.close(() => resolve()));
  args.closeDb();
  await rm(args.tempDir, { recursive: true, force: true });
  process.env = { ...originalEnv };
  vi.clearAllMocks();
}

export async function sendJson(
  url: string,
  body: unknown,
  options: { method?: string; headers?: Record<string, string> } = {},
) {
  return fetch(url, {
    method: options.method ?? "POST",
    headers: { "Content-Type": "application/json", ...options.headers },
    body: JSON.stringify(body),
  });
}
