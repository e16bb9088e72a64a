/**
 * Region precedence
 */

import type { ResolutionContext, ResolvedRegion } from "../../types/credentials.js";
import type { Profile } from "../../types/profile.js";

/**
 * Pick the region for the wrapped command
 *
 * Priority: command-level `--region` > environment > profile > unset
 */
export function resolveRegion(
  context: Pick<ResolutionContext, "commandRegion" | "environmentRegion">,
  profile: Profile
): ResolvedRegion | undefined {
  if (context.commandRegion) {
    return { value: context.commandRegion, source: "command" };
  }
  if (context.environmentRegion) {
    return { value: context.environmentRegion, source: "environment" };
  }
  if (profile.region) {
    return { value: profile.region, source: "profile" };
  }
  return undefined;
}

/**
 * Find a `--region` value in wrapped CLI arguments
 */
export function findRegionArgument(args: readonly string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--region") {
      return args[i + 1];
    }
    if (arg.startsWith("--region=")) {
      return arg.slice("--region=".length);
    }
  }
  return undefined;
}
