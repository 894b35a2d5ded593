import { describe, expect, it } from "vitest";
import { defaultLogLevel, resolveLogLevel } from "./env";

describe("log level", () => {
  it("defaults by environment", () => {
    expect(defaultLogLevel("production")).toBe("info");
    expect(defaultLogLevel("test")).toBe("warn");
    expect(defaultLogLevel("development")).toBe("debug");
  });

  it("prefers a valid LOG_LEVEL", () => {
    expect(resolveLogLevel(" ERROR ", "production")).toBe("error");
    expect(resolveLogLevel("verbose", "test")).toBe("warn");
    expect(resolveLogLevel(undefined, "production")).toBe("info");
  });
});
