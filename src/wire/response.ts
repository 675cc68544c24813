// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { InferenceServerError } from "../errors.js";
import type { ParameterValue } from "../types.js";
import {
  ModelStreamInferResponseSchema,
  type InferParameterInit,
  type ModelInferResponseMessage,
  type ModelStreamInferResponseInit,
} from "./messages.js";
import { toInferParameter, type EncodedTensor } from "./request.js";

export interface InferResponseFields {
  modelName: string;
  modelVersion?: string;
  id?: string;
  parameters?: Record<string, ParameterValue>;
  outputs: readonly EncodedTensor[];
}

/** Build a successful `ModelStreamInferResponse` carrying raw output tensors. */
export function encodeStreamResponse(fields: InferResponseFields): ModelStreamInferResponseInit {
  const parameters: Record<string, InferParameterInit> = {};
  for (const [key, value] of Object.entries(fields.parameters ?? {})) {
    parameters[key] = toInferParameter(value);
  }
  return {
    error_message: "",
    infer_response: {
      model_name: fields.modelName,
      model_version: fields.modelVersion ?? "",
      id: fields.id ?? "",
      parameters,
      outputs: fields.outputs.map((t) => ({
        name: t.name,
        datatype: t.datatype,
        shape: t.shape.map(String),
        parameters: {},
      })),
      raw_output_contents: fields.outputs.map((t) => t.raw),
    },
  };
}

/** Build an in-band error response; the stream stays open. */
export function encodeStreamError(message: string): ModelStreamInferResponseInit {
  return { error_message: message, infer_response: null };
}

/**
 * Validate a deserialized `ModelStreamInferResponse`. A non-empty
 * `error_message` becomes an `InferenceServerError`.
 */
export function decodeStreamResponse(message: unknown): ModelInferResponseMessage {
  const parsed = ModelStreamInferResponseSchema.safeParse(message);
  if (!parsed.success) {
    throw new InferenceServerError(`malformed stream response: ${parsed.error.message}`);
  }
  const { error_message, infer_response } = parsed.data;
  if (error_message) {
    throw new InferenceServerError(error_message);
  }
  if (!infer_response) {
    throw new InferenceServerError("stream response carries neither a result nor an error");
  }
  return infer_response;
}
