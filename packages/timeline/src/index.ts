export type { AuditRecorder, AuditEntryInput, Clock } from "./audit.js";
export { AuditEntrySchema, InMemoryAuditRecorder, createAuditEntry, recordAll, systemClock } from "./audit.js";

export type {
  SequencerAnomaly,
  SequencerOptions,
  SequencerState,
  SequencerStep,
  SequenceResult,
} from "./sequencer.js";
export { initialSequencerState, sequenceAssertions, sortAssertions, stepSequencer } from "./sequencer.js";

export type { MergeOptions, MergeResult } from "./merger.js";
export { assertCanonicalInvariants, compareDrafts, mergeDrafts, mergeIntervals } from "./merger.js";

export type { DailyLimit, DateRange, ProjectionOptions } from "./projector.js";
export { UNLIMITED, enumerateDates, project, projectIntervals, projectOnDates } from "./projector.js";

export type { DiffOptions, ReconcileOptions, ReconcileResult } from "./reconcile.js";
export { diffCanonicalSets, isEmptyDelta, reconcileFund } from "./reconcile.js";

export type { FundBuildResult, FundRunResult, PipelineOptions } from "./pipeline.js";
export { rebuildFund, runFundPipeline } from "./pipeline.js";

export type { BatchLogger, BatchOptions, BatchSummary, FundBatch, FundFailure, FundReport } from "./batch.js";
export { loadFundBatches, runBatch } from "./batch.js";

export type { TimelineConfig, TimelineConfigOverrides } from "./config.js";
export { TimelineConfigSchema, loadConfig } from "./config.js";

export { canonicalJson, fingerprintIntervals, intervalIdentity, sha256Hex } from "./hash.js";

export * from "./store.js";
export * from "./in-memory-store.js";
export * from "./sqlite-store.js";
