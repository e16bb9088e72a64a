/**
 * Process launcher exports
 */

export {
  launch,
  ensureExecutable,
  FORWARDED_SIGNALS,
  type LaunchRequest,
  type LauncherDeps,
  type SignalSource,
} from "./launcher.js";
export { buildChildEnv, hasProfileArgument, type ChildEnvOptions } from "./environment.js";
export {
  SpawnedChild,
  spawnChild,
  exitStatus,
  type ChildHandle,
  type ChildExit,
} from "./child.js";
