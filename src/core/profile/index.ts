/**
 * Profile module exports
 */

export { classify, getBadges, formatBadges } from "./classify.js";
export { resolveChain } from "./chain.js";
export {
  loadProfiles,
  assertWellFormedIni,
  type LoadedProfiles,
  type ProfileWarning,
} from "./loader.js";
export { parseProfile, rawProfileSchema } from "./schema.js";
export {
  ProfileStore,
  resolveProfileName,
  DEFAULT_PROFILE_NAME,
} from "./store.js";
