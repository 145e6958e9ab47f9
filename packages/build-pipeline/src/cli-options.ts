/**
 * Options shared by the docfence commands.
 */

import { InvalidArgumentError, type Command } from "commander";
import {
  configFromEnv,
  createRendererConfig,
  validateConfig,
  type RendererConfig,
} from "@docfence/fence-render";

export interface RendererCliOptions {
  freezeBin?: string;
  pikchrBin?: string;
  timeout?: number;
}

/**
 * Register the renderer flags on a command.
 */
export function addRendererOptions(command: Command): Command {
  return command
    .option("--freeze-bin <path>", "freeze executable (env: DOCFENCE_FREEZE_BIN)")
    .option("--pikchr-bin <path>", "pikchr executable (env: DOCFENCE_PIKCHR_BIN)")
    .option("--timeout <ms>", "Renderer timeout in milliseconds (env: DOCFENCE_TIMEOUT_MS)", parsePositiveInt);
}

/**
 * Resolve renderer configuration: defaults, then environment, then flags.
 */
export function resolveRendererConfig(
  options: RendererCliOptions,
  env: NodeJS.ProcessEnv = process.env,
): RendererConfig {
  const overrides = configFromEnv(env);
  if (options.freezeBin !== undefined) overrides.freezeBin = options.freezeBin;
  if (options.pikchrBin !== undefined) overrides.pikchrBin = options.pikchrBin;
  if (options.timeout !== undefined) overrides.timeoutMs = options.timeout;

  const config = createRendererConfig(overrides);
  validateConfig(config);
  return config;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Collect repeated `key=value` flags into an ordered attribute map.
 */
export function collectAttribute(value: string, previous: Map<string, string>): Map<string, string> {
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}".`);
  }
  const next = new Map(previous);
  next.set(value.slice(0, eq).trim(), value.slice(eq + 1));
  return next;
}
