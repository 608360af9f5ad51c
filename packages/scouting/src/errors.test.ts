import { describe, expect, it } from "vitest";
import { ConfigurationError, describeError } from "./errors";

describe("describeError", () => {
  it("uses the message of an Error", () => {
    expect(describeError(new ConfigurationError("Missing roster"))).toBe("Missing roster");
  });

  it("stringifies anything else without throwing", () => {
    const circular: { self?: unknown } = {};
    circular.self = circular;

    expect(describeError("plain")).toBe("plain");
    expect(describeError(undefined)).toBe("undefined");
    expect(describeError(10n)).toBe("10");
    expect(describeError(circular)).toBe("[object Object]");
  });
});
