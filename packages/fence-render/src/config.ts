/**
 * Renderer Configuration
 *
 * Where the external renderers live and how long they may run.
 */

import { z } from "zod";

/**
 * Configuration shared by all fence renderers.
 */
export interface RendererConfig {
  /** freeze executable (name on PATH or absolute path) */
  freezeBin: string;

  /** pikchr executable (name on PATH or absolute path) */
  pikchrBin: string;

  /** Kill a renderer that runs longer than this, in milliseconds */
  timeoutMs: number;
}

/** Default renderer timeout: 30 seconds */
export const DEFAULT_RENDER_TIMEOUT = 30 * 1000;

/**
 * Default configuration values.
 */
export const defaultConfig: RendererConfig = {
  freezeBin: "freeze",
  pikchrBin: "pikchr",
  timeoutMs: DEFAULT_RENDER_TIMEOUT,
};

const timeoutSchema = z.coerce.number().int().positive();

/**
 * Create a complete configuration with defaults.
 */
export function createRendererConfig(partial: Partial<RendererConfig> = {}): RendererConfig {
  const config = { ...defaultConfig };
  for (const [key, value] of Object.entries(partial)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }
  return config;
}

/**
 * Read configuration overrides from the environment.
 *
 * - `DOCFENCE_FREEZE_BIN`
 * - `DOCFENCE_PIKCHR_BIN`
 * - `DOCFENCE_TIMEOUT_MS`
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<RendererConfig> {
  const overrides: Partial<RendererConfig> = {};
  if (env.DOCFENCE_FREEZE_BIN) {
    overrides.freezeBin = env.DOCFENCE_FREEZE_BIN;
  }
  if (env.DOCFENCE_PIKCHR_BIN) {
    overrides.pikchrBin = env.DOCFENCE_PIKCHR_BIN;
  }
  if (env.DOCFENCE_TIMEOUT_MS) {
    const parsed = timeoutSchema.safeParse(env.DOCFENCE_TIMEOUT_MS);
    if (!parsed.success) {
      throw new Error(`DOCFENCE_TIMEOUT_MS must be a positive integer, got "${env.DOCFENCE_TIMEOUT_MS}"`);
    }
    overrides.timeoutMs = parsed.data;
  }
  return overrides;
}

/**
 * Validate configuration.
 */
export function validateConfig(config: RendererConfig): void {
  if (!config.freezeBin) {
    throw new Error("freezeBin is required");
  }
  if (!config.pikchrBin) {
    throw new Error("pikchrBin is required");
  }
  if (!timeoutSchema.safeParse(config.timeoutMs).success) {
    throw new Error("timeoutMs must be a positive integer");
  }
}
