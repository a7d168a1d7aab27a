/**
 * ecs-mgr public API
 */

export { runCli, buildProgram, PROGRAM_NAME, type CliDeps } from "./cli/program.js";
export { checkDependencies, REQUIRED_MODULES } from "./cli/preflight.js";
export {
  OPERATIONS,
  OPERATION_NAMES,
  resolveOperation,
  type Operation,
  type OperationContext,
  type OperationName,
  type BulkResult,
} from "./commands/ecs.js";
export {
  configSchema,
  resolveConfig,
  resolveRegion,
  DEFAULT_REGION,
  SUPPORTED_REGIONS,
  type EcsMgrConfig,
  type SupportedRegion,
} from "./config/config.js";
export { shortName, sortedShortNames } from "./containers/arn.js";
export { EcsControlPlane, createEcsControlPlane } from "./containers/control-plane.js";
export type { ControlPlane, EcsControlPlaneConfig, ServiceCapacity } from "./containers/types.js";
export { MissingDependencyError, TransportError, UsageError } from "./errors.js";
export type { RuntimeEnv } from "./runtime.js";
