/**
 * Core module exports
 */

// borg invocation and listing
export {
  buildCompactArgs,
  buildCreateArgs,
  buildListArgs,
  buildPruneArgs,
  classifyExitCode,
  describeStep,
  type ListingEntry,
  parseBorgListing,
  runBorgSequence,
  STEP_LABELS,
} from "./borg";

// Log rotation
export { archiveRunLog, buildLogrotateArgs } from "./logrotate/archiver";

// Timeline
export { makeLabels, renderTimeline, type TimelineOptions } from "./plot/timeline";

// Run pipeline
export {
  buildChildEnvironment,
  checkNetwork,
  isGatewayAllowed,
  type RunDependencies,
  type RunOptions,
  runProfile,
} from "./run";
