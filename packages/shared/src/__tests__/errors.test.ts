/**
 * Tests for the error hierarchy and its helpers.
 */

import { describe, expect, test } from "vitest";
import {
  CapacityExceededError,
  NetworkError,
  OutpostError,
  UnauthorizedError,
  errorMessage,
  isUnauthorized,
} from "../errors.js";

describe("OutpostError", () => {
  test("toJSON carries name, code, message and context", () => {
    const err = new NetworkError("Request timed out", "NETWORK_TIMEOUT", { timeout: 5000 });
    expect(err.toJSON()).toEqual({
      name: "NetworkError",
      code: "NETWORK_TIMEOUT",
      message: "Request timed out",
      context: { timeout: 5000 },
    });
  });

  test("subclasses stay instances of the base class", () => {
    const err = new CapacityExceededError("No free workspace slot", { max: 2 });
    expect(err).toBeInstanceOf(OutpostError);
    expect(err.code).toBe("CAPACITY_EXCEEDED");
  });
});

describe("isUnauthorized", () => {
  test("matches only UnauthorizedError", () => {
    expect(isUnauthorized(new UnauthorizedError())).toBe(true);
    expect(isUnauthorized(new NetworkError("HTTP 500", "NETWORK_HTTP_500"))).toBe(false);
    expect(isUnauthorized("401")).toBe(false);
  });

  test("UnauthorizedError has a fixed code", () => {
    expect(new UnauthorizedError("token revoked").code).toBe("AUTH_UNAUTHORIZED");
  });
});

describe("errorMessage", () => {
  test("uses the message of Error values and stringifies the rest", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
