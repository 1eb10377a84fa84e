export {
  archiveLocation,
  buildCompactArgs,
  buildCreateArgs,
  buildListArgs,
  buildPruneArgs,
} from "./args";
export { type ListingEntry, type ParsedListing, parseBorgListing, parseListingLine } from "./listing";
export {
  type BorgSequenceOptions,
  type BorgSequenceResult,
  classifyExitCode,
  describeStep,
  runBorgSequence,
  STEP_LABELS,
} from "./runner";
