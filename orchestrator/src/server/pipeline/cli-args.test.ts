import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { parseMigrateArgs } from "./cli-args";

describe("parseMigrateArgs", () => {
  it("returns empty options when no flags are given", () => {
    expect(parseMigrateArgs([])).toEqual({});
  });

  it("parses every flag", () => {
    expect(
      parseMigrateArgs([
        "--entities",
        "jobs, candidates,",
        "--with-dependencies",
        "--export",
        "--dry-run",
        "--limit",
        "25",
        "--delay=100",
      ]),
    ).toEqual({
      entities: ["jobs", "candidates"],
      includeDependencies: true,
      exportFirst: true,
      dryRun: true,
      limit: 25,
      delayMs: 100,
    });
  });

  it("returns null for --help", () => {
    expect(parseMigrateArgs(["--help"])).toBeNull();
  });

  it("rejects unknown entities and non-numeric limits", () => {
    expect(() => parseMigrateArgs(["--entities", "prospects"])).toThrow(ZodError);
    expect(() => parseMigrateArgs(["--limit", "many"])).toThrow(ZodError);
  });

  it("rejects unknown flags", () => {
    expect(() => parseMigrateArgs(["--force"])).toThrow();
  });
});
