import { describe, it, expect } from "vitest";
import { z } from "zod";
import { buildErrorV1, getStatusCodeForErrorCode, sanitizeErrorMessage, toErrorV1 } from "../../../src/utils/errors.js";
import { ErrorV1 } from "../../../src/schemas/intent.js";

function withStatus(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { statusCode });
}

describe("error.v1", () => {
  it("omits empty details and request id", () => {
    expect(buildErrorV1("INTERNAL", "boom", {})).toEqual({ schema: "error.v1", code: "INTERNAL", message: "boom" });
  });

  it("maps zod errors to BAD_INPUT", () => {
    const result = z.object({ text: z.string() }).safeParse({});
    if (result.success) throw new Error("expected failure");
    const error = toErrorV1(result.error);
    expect(error.code).toBe("BAD_INPUT");
    expect(error.message).toBe("Validation failed");
  });

  it("maps 429 to RATE_LIMITED and other 4xx to BAD_INPUT", () => {
    expect(toErrorV1(withStatus("slow down", 429)).code).toBe("RATE_LIMITED");
    expect(toErrorV1(withStatus("Body is too large", 413))).toEqual({
      schema: "error.v1",
      code: "BAD_INPUT",
      message: "Body is too large",
    });
  });

  it("passes a prebuilt envelope through", () => {
    const envelope = { statusCode: 429, ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: 30 }) };
    expect(toErrorV1(envelope)).toEqual({
      schema: "error.v1",
      code: "RATE_LIMITED",
      message: "Too many requests",
      details: { retry_after_seconds: 30 },
    });
  });

  it("sanitises internal errors", () => {
    expect(toErrorV1(new Error("cannot open /srv/assets/model.gguf"))).toEqual({
      schema: "error.v1",
      code: "INTERNAL",
      message: "cannot open [path]",
    });
    expect(toErrorV1(undefined).message).toBe("An unexpected error occurred");
  });

  it("redacts key assignments", () => {
    expect(sanitizeErrorMessage("bad MODEL_API_KEY=test-secret")).toBe("bad [KEY_REDACTED]");
  });

  it.each([
    ["BAD_INPUT", 400],
    ["RATE_LIMITED", 429],
    ["INTERNAL", 500],
  ] as const)("maps %s to %d", (code, status) => {
    expect(getStatusCodeForErrorCode(code)).toBe(status);
  });

  it("only knows the codes the service emits", () => {
    expect(ErrorV1.shape.code.options).toEqual(["BAD_INPUT", "RATE_LIMITED", "INTERNAL"]);
  });
});
