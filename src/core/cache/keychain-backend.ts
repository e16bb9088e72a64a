/**
 * Platform secret-storage backends
 *
 * macOS uses the `security` tool and Linux the libsecret `secret-tool`.
 * Payloads travel on stdin and are stored base64-encoded.
 */

import type { CacheBackend } from "../../types/cache.js";
import { findExecutable, runCommand, type CommandResult, type RunCommandOptions } from "../utils/process.js";

/**
 * Service name entries are filed under
 */
export const KEYCHAIN_SERVICE = "awrap";

const KEYCHAIN_TIMEOUT_MS = 10_000;

/**
 * `security` exit status for a missing item
 */
const SECURITY_ITEM_NOT_FOUND = 44;

/**
 * Runs a platform tool to completion
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

/**
 * Dependencies of the keychain backends
 */
export interface KeychainDeps {
  run: CommandRunner;
  which: (name: string) => string | undefined;
  env: NodeJS.ProcessEnv;
}

const defaultDeps: KeychainDeps = {
  run: runCommand,
  which: (name) => findExecutable(name),
  env: process.env,
};

function encode(payload: string): string {
  return Buffer.from(payload, "utf-8").toString("base64");
}

function decode(secret: string): string {
  return Buffer.from(secret.trim(), "base64").toString("utf-8");
}

/**
 * Quote an argument for `security -i`
 */
function quote(value: string): string {
  return `"${value.replace(/[\\"]/g, (c) => `\\${c}`)}"`;
}

/**
 * macOS login keychain via `security`
 */
export class MacKeychainBackend implements CacheBackend {
  readonly location = "keychain" as const;

  constructor(private readonly deps: KeychainDeps = defaultDeps) {}

  async isAvailable(): Promise<boolean> {
    return this.deps.which("security") !== undefined;
  }

  async read(profileName: string): Promise<string | undefined> {
    const result = await this.security([
      "find-generic-password",
      "-s",
      KEYCHAIN_SERVICE,
      "-a",
      profileName,
      "-w",
    ]);

    if (result.exitCode === SECURITY_ITEM_NOT_FOUND) {
      return undefined;
    }
    this.check(result, "read");
    return decode(result.stdout);
  }

  async write(profileName: string, payload: string): Promise<void> {
    // Interactive mode keeps the secret out of argv
    const line = [
      "add-generic-password",
      "-U",
      "-s",
      quote(KEYCHAIN_SERVICE),
      "-a",
      quote(profileName),
      "-w",
      quote(encode(payload)),
    ].join(" ");

    const result = await this.security(["-i"], `${line}\n`);
    this.check(result, "write");
  }

  async remove(profileName: string): Promise<void> {
    if (!(await this.isAvailable())) {
      return;
    }
    const result = await this.security([
      "delete-generic-password",
      "-s",
      KEYCHAIN_SERVICE,
      "-a",
      profileName,
    ]);
    if (result.exitCode !== SECURITY_ITEM_NOT_FOUND) {
      this.check(result, "remove");
    }
  }

  async removeAll(): Promise<void> {
    if (!(await this.isAvailable())) {
      return;
    }
    // `security` deletes one matching item per call
    for (let i = 0; i < 1000; i++) {
      const result = await this.security(["delete-generic-password", "-s", KEYCHAIN_SERVICE]);
      if (result.exitCode !== 0) {
        return;
      }
    }
  }

  private security(args: string[], input?: string): Promise<CommandResult> {
    return this.deps.run("security", args, { input, timeoutMs: KEYCHAIN_TIMEOUT_MS });
  }

  private check(result: CommandResult, action: string): void {
    if (result.exitCode !== 0) {
      throw new Error(`Keychain ${action} failed with exit code ${result.exitCode}`);
    }
  }
}

/**
 * Secret Service (GNOME Keyring, KWallet) via `secret-tool`
 */
export class SecretToolBackend implements CacheBackend {
  readonly location = "keychain" as const;

  constructor(private readonly deps: KeychainDeps = defaultDeps) {}

  async isAvailable(): Promise<boolean> {
    return (
      this.deps.which("secret-tool") !== undefined &&
      Boolean(this.deps.env.DBUS_SESSION_BUS_ADDRESS)
    );
  }

  async read(profileName: string): Promise<string | undefined> {
    const result = await this.secretTool(["lookup", ...this.attributes(profileName)]);

    // lookup exits 1 with empty output for a missing item
    if (result.exitCode !== 0 || result.stdout.trim() === "") {
      return undefined;
    }
    return decode(result.stdout);
  }

  async write(profileName: string, payload: string): Promise<void> {
    const result = await this.secretTool(
      ["store", `--label=awrap credentials (${profileName})`, ...this.attributes(profileName)],
      encode(payload)
    );
    if (result.exitCode !== 0) {
      throw new Error(`Keychain write failed with exit code ${result.exitCode}`);
    }
  }

  async remove(profileName: string): Promise<void> {
    if (await this.isAvailable()) {
      await this.secretTool(["clear", ...this.attributes(profileName)]);
    }
  }

  async removeAll(): Promise<void> {
    if (await this.isAvailable()) {
      await this.secretTool(["clear", "service", KEYCHAIN_SERVICE]);
    }
  }

  private attributes(profileName: string): string[] {
    return ["service", KEYCHAIN_SERVICE, "profile", profileName];
  }

  private secretTool(args: string[], input?: string): Promise<CommandResult> {
    return this.deps.run("secret-tool", args, { input, timeoutMs: KEYCHAIN_TIMEOUT_MS });
  }
}

/**
 * Keychain backend for the current platform, if there is one
 */
export function createKeychainBackend(
  platform: NodeJS.Platform = process.platform,
  deps: KeychainDeps = defaultDeps
): CacheBackend | undefined {
  switch (platform) {
    case "darwin":
      return new MacKeychainBackend(deps);
    case "linux":
      return new SecretToolBackend(deps);
    default:
      return undefined;
  }
}
