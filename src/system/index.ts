/**
 * External systems: processes, network, secret store, desktop session
 */

export {
  type GatewayResolver,
  IpRouteGatewayResolver,
  normalizeMac,
  parseDefaultRoute,
  parseNeighbourMac,
} from "./gateway";
export {
  type CommandResult,
  type CommandRunner,
  type OutputTee,
  type RunCommandOptions,
  runCommand,
  SPAWN_FAILURE_EXIT_CODE,
} from "./process";
export { describeAttributes, type SecretStore, SecretToolStore } from "./secret-store";
export {
  defaultSessionScriptPath,
  exportSessionVariables,
  parseSessionScript,
  readSessionScript,
  renderSessionScript,
  SESSION_VARIABLE_NAMES,
  sessionEnvironment,
} from "./session";
