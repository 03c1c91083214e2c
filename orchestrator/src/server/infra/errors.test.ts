import { HttpError } from "@server/services/http/errors";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { AppError, conflict, notFound, statusToCode, toAppError } from "./errors";

function upstream(status: number): HttpError {
  return new HttpError({
    status,
    statusText: "",
    url: "https://upstream.test/v1/candidates",
    bodySnippet: '{"errors":[]}',
    headers: {},
  });
}

describe("toAppError", () => {
  it("passes application errors through", () => {
    const error = conflict("Migration already running");
    expect(toAppError(error)).toBe(error);
  });

  it("maps validation failures to 400", () => {
    const result = z.object({ limit: z.number() }).safeParse({ limit: "x" });
    if (result.success) throw new Error("expected a validation failure");

    const error = toAppError(result.error);
    expect(error.status).toBe(400);
    expect(error.code).toBe("INVALID_REQUEST");
    expect(error.message).toBe("Invalid request");
  });

  it("keeps an upstream 404 local and wraps other upstream failures", () => {
    expect(toAppError(upstream(404))).toMatchObject({
      status: 404,
      code: "NOT_FOUND",
    });
    expect(toAppError(upstream(422))).toMatchObject({
      status: 502,
      code: "UPSTREAM_ERROR",
      details: {
        upstreamStatus: 422,
        url: "https://upstream.test/v1/candidates",
        body: '{"errors":[]}',
      },
    });
  });

  it("maps aborted requests to a timeout", () => {
    const aborted = new Error("aborted");
    aborted.name = "AbortError";
    expect(toAppError(aborted)).toMatchObject({ status: 408, code: "REQUEST_TIMEOUT" });
  });

  it("falls back to an internal error", () => {
    const error = toAppError("boom");
    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ status: 500, code: "INTERNAL_ERROR" });
    expect(notFound().message).toBe("Not found");
  });
});

describe("statusToCode", () => {
  it("uses the internal error code for statuses without a mapping", () => {
    expect(statusToCode(429)).toBe("RATE_LIMITED");
    expect(statusToCode(403)).toBe("INTERNAL_ERROR");
  });
});
