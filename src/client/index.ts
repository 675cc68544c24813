// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

export { InferenceServerClient, withClient } from "./grpc.js";
export { InferInput, InferRequestedOutput, InferResult } from "./infer.js";
export { InferStream } from "./stream.js";
export { CompletionQueue } from "./queue.js";
export type {
  AsyncStreamInferOptions,
  InferenceServerClientOptions,
  StartStreamOptions,
  StreamCallback,
} from "./types.js";
