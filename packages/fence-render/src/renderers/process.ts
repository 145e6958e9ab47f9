/**
 * Child process helper for external renderers.
 */

import { spawn, type ChildProcess } from "node:child_process";

export interface RunProcessOptions {
  /** Timeout in milliseconds */
  timeoutMs: number;
  cwd?: string;
}

/**
 * How a renderer process ended. `exited` covers any exit code; `failed`
 * means it could not be started, could not be talked to, or timed out.
 */
export type ProcessOutcome =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string }
  | { kind: "failed"; error: Error };

/** Grace period between SIGTERM and SIGKILL for a timed-out renderer */
const KILL_GRACE_PERIOD = 5000;

/**
 * Run a command with `input` on stdin and collect its output.
 *
 * Never rejects: every way the process can go wrong is reported through the
 * returned outcome.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  input: string,
  options: RunProcessOptions,
): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    let proc: ChildProcess;
    try {
      proc = spawn(command, args, {
        stdio: ["pipe", "pipe", "pipe"],
        shell: false,
        cwd: options.cwd,
      });
    } catch (error) {
      resolve({ kind: "failed", error: toError(error) });
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let stdinError: Error | undefined;
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    // Set up timeout to kill a hung renderer
    const timeoutId = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
      // Force kill after the grace period if still running
      killTimer = setTimeout(() => proc.kill("SIGKILL"), KILL_GRACE_PERIOD);
      killTimer.unref();
    }, options.timeoutMs);

    const settle = (outcome: ProcessOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      resolve(outcome);
    };

    proc.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (error) => settle({ kind: "failed", error }));

    proc.on("close", (code, signal) => {
      if (timedOut) {
        settle({
          kind: "failed",
          error: new Error(`${command} timed out after ${options.timeoutMs / 1000}s`),
        });
        return;
      }
      if (code === null) {
        settle({ kind: "failed", error: new Error(`${command} was killed by ${signal ?? "a signal"}`) });
        return;
      }
      // EPIPE is expected when a renderer exits before reading all input;
      // it only counts as the failure when the exit was clean.
      if (code === 0 && stdinError) {
        settle({ kind: "failed", error: stdinError });
        return;
      }
      settle({
        kind: "exited",
        exitCode: code,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });

    proc.stdin?.on("error", (error) => {
      stdinError = error;
    });
    proc.stdin?.end(input, "utf-8");
  });
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Diagnostic text for a renderer that exited non-zero: what it printed on
 * stderr, else stdout, else just the exit code.
 */
export function describeExit(
  command: string,
  outcome: { exitCode: number; stdout: string; stderr: string },
): string {
  const stderr = outcome.stderr.trim();
  if (stderr) return stderr;
  const stdout = outcome.stdout.trim();
  if (stdout) return stdout;
  return `${command} exited with code ${outcome.exitCode}`;
}
