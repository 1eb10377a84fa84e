/**
 * Centralized type exports for borgrun
 */

// Config types
export type {
  BorgConfig,
  BorgrunConfig,
  LogrotateConfig,
  NetworkConfig,
  Profile,
  PruneConfig,
  SecretConfig,
} from "./config";
// Run types
export type {
  BorgOperation,
  BorgStepResult,
  Environment,
  RunOutcome,
  RunState,
  SessionVariables,
  StageResult,
  StepStatus,
} from "./run";
