// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

export { buildSequencePlan, sequenceRoute, totalRequests, type PlannedSequence, type SequencePlan, type PlanOptions } from "./plan.js";
export { asyncStreamSend, sequenceRequestId, type StreamInferTarget, type SendOptions } from "./sender.js";
export {
  collectResults,
  scalarOutput,
  sequenceKeyOf,
  type CollectedOutputs,
  type CollectOptions,
  type StreamItem,
} from "./collector.js";
export {
  correlationValue,
  expectedOutputs,
  validateSequences,
  type ValidateOptions,
  type ValidationReport,
} from "./validator.js";
export { runSequenceCheck, type RunPhase, type SequenceCheckOptions } from "./runner.js";
