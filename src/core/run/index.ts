export { checkNetwork, isGatewayAllowed } from "./guard";
export {
  buildChildEnvironment,
  type RunDependencies,
  type RunOptions,
  runProfile,
} from "./orchestrator";
export { attempt, fail, ok } from "./result";
export { RunLog } from "./run-log";
