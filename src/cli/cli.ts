/**
 * CLI configuration
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { toAwrapError } from "../core/errors.js";
import { runCommand, type RunOptions } from "./commands/run.js";
import * as logger from "./utils/logger.js";

/**
 * Get package version
 */
export function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Report a failure and map it to an exit status
 */
export function reportError(error: unknown): number {
  const failure = toAwrapError(error);
  logger.error(failure.message);
  if (failure.hint) {
    logger.hint(failure.hint);
  }
  if (logger.isVerbose() && failure.stack) {
    logger.verbose(failure.stack);
  }
  return failure.exitCode;
}

/**
 * Create CLI program
 *
 * The chosen exit status is passed to `onExit` once the action finishes.
 */
export function createProgram(
  onExit: (code: number) => void,
  run: typeof runCommand = runCommand
): Command {
  const program = new Command();

  program
    .name("awrap")
    .description("Resolve AWS credentials for a profile and run an AWS CLI command with them")
    .version(getVersion(), "-V, --version")
    .usage("[options] [--] <aws command...>")
    .option("-p, --profile <name>", "Profile to use (defaults to AWS_PROFILE, then 'default')")
    .option("-c, --config", "List discovered profiles and exit")
    .option("-n, --no-interactive", "Never prompt; fail with a remediation command instead")
    .option("--clear-cache [profile]", "Remove cached credentials (all profiles if none given)")
    .option("-v, --verbose", "Verbose output")
    .argument("[command...]", "AWS CLI arguments")
    .passThroughOptions()
    .action(async (args: string[], options: RunOptions) => {
      try {
        onExit(await run(args, options));
      } catch (error) {
        onExit(reportError(error));
      }
    });

  return program;
}
