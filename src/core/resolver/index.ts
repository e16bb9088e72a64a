/**
 * Credential resolver exports
 */

export {
  CredentialResolver,
  createSessionName,
  mfaRemediationCommand,
  MFA_MAX_ATTEMPTS,
  type ResolverDeps,
  type ResolverLogger,
} from "./resolver.js";
export { resolveRegion, findRegionArgument } from "./region.js";
export type { Prompter, MfaPromptRequest } from "./prompter.js";
