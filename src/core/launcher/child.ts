/**
 * Child process handle
 */

import { spawn, type ChildProcess } from "node:child_process";
import { constants } from "node:os";
import { ExecutableNotFoundError } from "../errors.js";

/**
 * How a child process ended
 */
export type ChildExit =
  | { kind: "code"; code: number }
  | { kind: "signal"; signal: NodeJS.Signals };

/**
 * A running wrapped command
 */
export interface ChildHandle {
  readonly pid: number | undefined;

  /** Deliver a signal to the child; false when it is already gone */
  forwardSignal(signal: NodeJS.Signals): boolean;

  wait(): Promise<ChildExit>;
}

/**
 * Exit status mirroring a child's end: its code, or 128 + signal number
 */
export function exitStatus(exit: ChildExit): number {
  if (exit.kind === "code") {
    return exit.code;
  }
  return 128 + (constants.signals[exit.signal] ?? 0);
}

/**
 * ChildHandle over a Node child process
 */
export class SpawnedChild implements ChildHandle {
  private readonly exited: Promise<ChildExit>;

  constructor(private readonly child: ChildProcess, command: string) {
    this.exited = new Promise((resolve, reject) => {
      child.once("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT" || error.code === "EACCES") {
          reject(new ExecutableNotFoundError(command));
        } else {
          reject(error);
        }
      });

      child.once("exit", (code, signal) => {
        if (signal) {
          resolve({ kind: "signal", signal });
        } else {
          resolve({ kind: "code", code: code ?? 0 });
        }
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  forwardSignal(signal: NodeJS.Signals): boolean {
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return false;
    }
    return this.child.kill(signal);
  }

  wait(): Promise<ChildExit> {
    return this.exited;
  }
}

/**
 * Spawn a command with the terminal passed straight through
 */
export function spawnChild(
  command: string,
  args: readonly string[],
  env: NodeJS.ProcessEnv
): ChildHandle {
  const child = spawn(command, [...args], { stdio: "inherit", env });
  return new SpawnedChild(child, command);
}
