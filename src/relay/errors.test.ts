import { describe, it, expect } from "vitest";
import { APICallError } from "ai";
import {
  RateLimitedError,
  StorageWriteError,
  TransientModelError,
  classifyModelError,
  describeError,
} from "./errors";

function apiError(statusCode: number, message: string): APICallError {
  return new APICallError({
    message,
    url: "https://generativelanguage.example/v1beta/models/test:generateContent",
    requestBodyValues: {},
    statusCode,
  });
}

describe("classifyModelError", () => {
  it("treats HTTP 429 as rate limiting", () => {
    const classified = classifyModelError(apiError(429, "Too Many Requests"));
    expect(classified).toBeInstanceOf(RateLimitedError);
    expect(classified.kind).toBe("rate_limited");
  });

  it("recognizes quota messages on other statuses", () => {
    expect(classifyModelError(apiError(403, "Resource has been exhausted (e.g. check quota)")))
      .toBeInstanceOf(RateLimitedError);
  });

  it("treats server errors as transient", () => {
    const classified = classifyModelError(apiError(500, "Internal error"));
    expect(classified).toBeInstanceOf(TransientModelError);
    expect(classified.message).toBe("Model call failed: Internal error");
    expect(classified.cause).toBeInstanceOf(APICallError);
  });

  it("handles non-error values", () => {
    expect(classifyModelError("boom").message).toBe("Model call failed: boom");
  });

  it("passes classified errors through", () => {
    const original = new RateLimitedError("already known");
    expect(classifyModelError(original)).toBe(original);
  });
});

describe("StorageWriteError", () => {
  it("names the key and the cause", () => {
    const error = new StorageWriteError("dialogs_2026-10-19", new Error("ENOSPC"));
    expect(error.message).toBe('Failed to write "dialogs_2026-10-19": ENOSPC');
    expect(error.name).toBe("StorageWriteError");
    expect(error.kind).toBe("storage_write");
  });
});

describe("describeError", () => {
  it("uses the message of errors and stringifies the rest", () => {
    expect(describeError(new Error("bad"))).toBe("bad");
    expect(describeError(42)).toBe("42");
  });
});
