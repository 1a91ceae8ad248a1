/**
 * Subprocess invocation for batch jobs
 */

import { spawn, type StdioOptions } from "node:child_process";
import { delimiter } from "node:path";

export interface InvokeOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdio?: StdioOptions;
}

export interface InvocationOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

/**
 * Runs one argv (program first) and resolves once it has finished.
 * Never rejects for a failing command: failures are part of the outcome.
 */
export type CommandInvoker = (
  argv: readonly string[],
  options?: InvokeOptions,
) => Promise<InvocationOutcome>;

/**
 * Spawn argv directly (no shell), inheriting the terminal by default
 */
export const spawnCommand: CommandInvoker = (argv, options = {}) => {
  const [program, ...args] = argv;

  if (program === undefined) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      error: new Error("Cannot invoke an empty command"),
    });
  }

  return new Promise((resolve) => {
    let settled = false;

    const child = spawn(program, args, {
      env: options.env ?? process.env,
      cwd: options.cwd,
      stdio: options.stdio ?? "inherit",
      shell: false,
    });

    // "error" fires when the program cannot be started (ENOENT, EACCES);
    // "close" may follow it, so only the first event counts
    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: null, signal: null, error });
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, signal });
    });
  });
};

/**
 * Build the environment for an invocation, prepending the image tool's
 * directory to PATH when one is configured
 */
export function buildInvocationEnv(
  toolPath: string | null,
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  if (!toolPath) {
    return { ...baseEnv };
  }

  const currentPath = baseEnv.PATH;
  return {
    ...baseEnv,
    PATH: currentPath ? `${toolPath}${delimiter}${currentPath}` : toolPath,
  };
}
