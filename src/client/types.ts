// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import type { InferenceServerError } from "../errors.js";
import type { LogFn, ParameterValue, SequenceId } from "../types.js";
import type { InferInput, InferRequestedOutput, InferResult } from "./infer.js";

export interface InferenceServerClientOptions {
  /** `host:port` of the server's gRPC endpoint, without a scheme. */
  url: string;
  /** Log every request written and response received at debug level. */
  verbose?: boolean;
  onLog?: LogFn;
}

/**
 * Receives every stream response. Exactly one argument is non-null: the
 * result, or the error the server or the transport reported.
 */
export type StreamCallback = (
  result: InferResult | null,
  error: InferenceServerError | null,
) => void;

export interface StartStreamOptions {
  callback: StreamCallback;
  /** Deadline for the whole stream, in seconds. */
  streamTimeout?: number | null;
}

export interface AsyncStreamInferOptions {
  modelName: string;
  inputs: readonly InferInput[];
  outputs?: readonly InferRequestedOutput[];
  modelVersion?: string;
  requestId?: string;
  sequenceId?: SequenceId;
  sequenceStart?: boolean;
  sequenceEnd?: boolean;
  priority?: number;
  /** Server-side request timeout, in microseconds. */
  timeout?: number;
  parameters?: Record<string, ParameterValue>;
}
