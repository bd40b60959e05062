import { describe, expect, it } from "vitest";

import { createLogger, normalizeError } from "./logger.js";

describe("normalizeError", () => {
  it("keeps the code and a normalized cause", () => {
    const cause = new Error("invalid port: abc");
    const error = Object.assign(new Error("reading file", { cause }), { code: "EISDIR" });
    const normalized = normalizeError(error);
    expect(normalized.message).toBe("reading file");
    expect(normalized.name).toBe("Error");
    expect(normalized.code).toBe("EISDIR");
    expect(normalized.cause).toMatchObject({ message: "invalid port: abc", name: "Error" });
  });

  it("handles non-error values", () => {
    expect(normalizeError("boom")).toEqual({ message: "boom" });
    expect(normalizeError({ reason: "boom" })).toEqual({ message: '{"reason":"boom"}' });
  });
});

describe("createLogger", () => {
  it("applies the requested level and bindings", () => {
    const logger = createLogger({ level: "warn", bindings: { component: "test" } });
    expect(logger.level).toBe("warn");
    expect(logger.bindings()).toMatchObject({ component: "test" });
  });
});
