// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

export {
  InferenceServerClient,
  withClient,
  InferInput,
  InferRequestedOutput,
  InferResult,
  InferStream,
  CompletionQueue,
  type AsyncStreamInferOptions,
  type InferenceServerClientOptions,
  type StartStreamOptions,
  type StreamCallback,
} from "./client/index.js";
export * from "./sequence/index.js";
export { SequenceInferenceServer, type FaultInjector, type SequenceServerOptions } from "./server.js";
export { ModelRepository, type SequenceModelDefinition } from "./repository.js";
export {
  InferenceServerError,
  SequenceProtocolError,
  SequenceMismatchError,
  QueueTimeoutError,
  ConfigError,
} from "./errors.js";
export {
  type SequenceId,
  type Datatype,
  type TensorElement,
  type ParameterValue,
  type LogLevel,
  type LogMessage,
  type LogFn,
} from "./types.js";
export { main, type CliIo } from "./cli/main.js";
export { parseCliArgs, type CliConfig } from "./cli/config.js";
export {
  DEFAULT_URL,
  SEQUENCE_VALUES,
  SEQUENCE_MODEL,
  DYNA_SEQUENCE_MODEL,
  STRING_DYNA_SEQUENCE_MODEL,
  INPUT_NAME,
  OUTPUT_NAME,
  SEQUENCE_ID_PARAM,
  SEQUENCE_START_PARAM,
  SEQUENCE_END_PARAM,
} from "./constants.js";
