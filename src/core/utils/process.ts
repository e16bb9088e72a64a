/**
 * Child process helpers
 */

import { spawn } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join } from "node:path";

/**
 * Result of running a command to completion
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Options for running a command
 */
export interface RunCommandOptions {
  /** Written to the child's stdin, which is then closed */
  input?: string;
  /** Kill the child after this many milliseconds */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Locate an executable on PATH
 *
 * Names containing a path separator are checked as given.
 */
export function findExecutable(
  name: string,
  pathEnv: string = process.env.PATH ?? ""
): string | undefined {
  const candidates =
    isAbsolute(name) || name.includes("/")
      ? [name]
      : pathEnv
          .split(delimiter)
          .filter((dir) => dir.length > 0)
          .map((dir) => join(dir, name));

  return candidates.find(isExecutableFile);
}

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Run a command with captured output
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: options.env ?? process.env,
    });

    let stdout = "";
    let stderr = "";
    let timer: NodeJS.Timeout | undefined;

    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        child.kill("SIGTERM");
      }, options.timeoutMs);
    }

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      reject(new Error(`Failed to start ${command}: ${error.message}`));
    });

    child.on("close", (code, signal) => {
      clearTimeout(timer);
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr,
      });
    });

    // Ignore EPIPE when the child exits without reading stdin
    child.stdin.on("error", () => undefined);
    child.stdin.end(options.input ?? "");
  });
}

/**
 * Run a command attached to the terminal
 *
 * Resolves with the exit code. Aborting the signal terminates the child.
 */
export function runInteractive(
  command: string,
  args: string[],
  options: { signal?: AbortSignal; env?: NodeJS.ProcessEnv } = {}
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: "inherit",
      env: options.env ?? process.env,
    });

    const onAbort = (): void => {
      child.kill("SIGINT");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("error", (error) => {
      options.signal?.removeEventListener("abort", onAbort);
      reject(new Error(`Failed to start ${command}: ${error.message}`));
    });

    child.on("close", (code) => {
      options.signal?.removeEventListener("abort", onAbort);
      resolve(code ?? 1);
    });
  });
}
