/**
 * Process launcher
 *
 * Runs the wrapped command with resolved credentials, forwards termination
 * signals to it and reports the exit status to mirror.
 */

import type { CredentialSet, ResolvedRegion } from "../../types/credentials.js";
import { ExecutableNotFoundError } from "../errors.js";
import { findExecutable } from "../utils/process.js";
import { exitStatus, spawnChild, type ChildHandle } from "./child.js";
import { buildChildEnv } from "./environment.js";

/**
 * Signals relayed to the child
 */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Where the wrapper receives signals
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Launch request
 */
export interface LaunchRequest {
  /** Executable name or path */
  command: string;
  args: readonly string[];
  credentials: CredentialSet;
  region?: ResolvedRegion;
  profileName: string;
}

/**
 * Hooks replaced in tests
 */
export interface LauncherDeps {
  spawn: (command: string, args: readonly string[], env: NodeJS.ProcessEnv) => ChildHandle;
  which: (name: string) => string | undefined;
  signals: SignalSource;
  env: NodeJS.ProcessEnv;
  onSignal?: (signal: NodeJS.Signals) => void;
}

const defaultDeps: LauncherDeps = {
  spawn: spawnChild,
  which: (name) => findExecutable(name),
  signals: process,
  env: process.env,
};

/**
 * Make sure the wrapped executable can be found
 *
 * @throws ExecutableNotFoundError
 */
export function ensureExecutable(
  command: string,
  which: (name: string) => string | undefined = defaultDeps.which
): string {
  const path = which(command);
  if (!path) {
    throw new ExecutableNotFoundError(command);
  }
  return path;
}

/**
 * Run the wrapped command to completion
 *
 * @returns Exit status for the wrapper: the child's exit code, or
 * 128 + N when the child was ended by signal N
 */
export async function launch(
  request: LaunchRequest,
  deps: Partial<LauncherDeps> = {}
): Promise<number> {
  const { spawn, which, signals, env, onSignal } = { ...defaultDeps, ...deps };

  const executable = ensureExecutable(request.command, which);
  const childEnv = buildChildEnv(env, {
    credentials: request.credentials,
    region: request.region,
    profileName: request.profileName,
    args: request.args,
  });

  const child = spawn(executable, request.args, childEnv);

  const listeners = FORWARDED_SIGNALS.map((signal) => {
    const listener = (): void => {
      onSignal?.(signal);
      child.forwardSignal(signal);
    };
    signals.on(signal, listener);
    return { signal, listener };
  });

  try {
    return exitStatus(await child.wait());
  } finally {
    for (const { signal, listener } of listeners) {
      signals.removeListener(signal, listener);
    }
  }
}
