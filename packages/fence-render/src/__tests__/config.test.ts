/**
 * Config tests
 */

import { describe, it, expect } from "vitest";
import {
  configFromEnv,
  createRendererConfig,
  defaultConfig,
  validateConfig,
  DEFAULT_RENDER_TIMEOUT,
} from "../config.js";

describe("createRendererConfig", () => {
  it("should apply default values", () => {
    expect(createRendererConfig()).toEqual({
      freezeBin: "freeze",
      pikchrBin: "pikchr",
      timeoutMs: DEFAULT_RENDER_TIMEOUT,
    });
  });

  it("should override defaults with provided values", () => {
    const config = createRendererConfig({ freezeBin: "/usr/local/bin/freeze", timeoutMs: 1000 });
    expect(config.freezeBin).toBe("/usr/local/bin/freeze");
    expect(config.pikchrBin).toBe("pikchr");
    expect(config.timeoutMs).toBe(1000);
  });

  it("should ignore explicitly undefined overrides", () => {
    expect(createRendererConfig({ pikchrBin: undefined })).toEqual(defaultConfig);
  });

  it("should not mutate the defaults", () => {
    createRendererConfig({ freezeBin: "other" });
    expect(defaultConfig.freezeBin).toBe("freeze");
  });
});

describe("configFromEnv", () => {
  it("should read binaries and timeout", () => {
    expect(
      configFromEnv({
        DOCFENCE_FREEZE_BIN: "/opt/freeze",
        DOCFENCE_PIKCHR_BIN: "/opt/pikchr",
        DOCFENCE_TIMEOUT_MS: "2500",
      }),
    ).toEqual({ freezeBin: "/opt/freeze", pikchrBin: "/opt/pikchr", timeoutMs: 2500 });
  });

  it("should return no overrides for an empty environment", () => {
    expect(configFromEnv({})).toEqual({});
  });

  it("should reject a non-numeric timeout", () => {
    expect(() => configFromEnv({ DOCFENCE_TIMEOUT_MS: "soon" })).toThrow(
      'DOCFENCE_TIMEOUT_MS must be a positive integer, got "soon"',
    );
  });
});

describe("validateConfig", () => {
  it("should accept the defaults", () => {
    expect(() => validateConfig(createRendererConfig())).not.toThrow();
  });

  it("should require binaries", () => {
    expect(() => validateConfig(createRendererConfig({ freezeBin: "" }))).toThrow("freezeBin is required");
    expect(() => validateConfig(createRendererConfig({ pikchrBin: "" }))).toThrow("pikchrBin is required");
  });

  it("should require a positive timeout", () => {
    expect(() => validateConfig(createRendererConfig({ timeoutMs: 0 }))).toThrow(
      "timeoutMs must be a positive integer",
    );
  });
});
