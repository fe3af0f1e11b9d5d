import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";

import { extractConfigPath, handleCLIError } from "../../../src/cli/helpers.js";
import { logger } from "../../../src/utils/logging.js";

vi.mock("../../../src/utils/logging.js", () => ({
  logger: {
    error: vi.fn(),
  },
}));

describe("extractConfigPath", () => {
  it("returns config path when provided as string", () => {
    expect(extractConfigPath({ config: "./ensemble.yaml" })).toBe(
      "./ensemble.yaml",
    );
  });

  it("returns undefined when config is not provided", () => {
    expect(extractConfigPath({})).toBeUndefined();
  });

  it("returns undefined when config is not a string", () => {
    expect(extractConfigPath({ config: 123 })).toBeUndefined();
  });

  it("returns the default path when config is not provided", () => {
    expect(extractConfigPath({}, "ensemble.yaml")).toBe("ensemble.yaml");
  });

  it("prefers the given path over the default", () => {
    expect(extractConfigPath({ config: "./custom.yaml" }, "ensemble.yaml")).toBe(
      "./custom.yaml",
    );
  });
});

describe("handleCLIError", () => {
  let mockExit: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockExit = vi.fn().mockImplementation(() => {
      throw new Error("process.exit called");
    });
    vi.stubGlobal("process", { ...process, exit: mockExit });
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.unstubAllGlobals();
  });

  it("logs error message when given an Error instance", () => {
    expect(() => handleCLIError(new Error("Shape mismatch"))).toThrow(
      "process.exit called",
    );

    expect(logger.error).toHaveBeenCalledWith("Shape mismatch");
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("logs string representation when given a non-Error value", () => {
    expect(() => handleCLIError("String error")).toThrow("process.exit called");

    expect(logger.error).toHaveBeenCalledWith("String error");
  });

  it("logs string representation for object errors", () => {
    expect(() => handleCLIError({ code: "ERR_FAILED" })).toThrow(
      "process.exit called",
    );

    expect(logger.error).toHaveBeenCalledWith("[object Object]");
  });

  it("handles undefined error", () => {
    expect(() => handleCLIError(undefined)).toThrow("process.exit called");

    expect(logger.error).toHaveBeenCalledWith("undefined");
    expect(mockExit).toHaveBeenCalledTimes(1);
  });
});
