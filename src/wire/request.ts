// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import {
  PRIORITY_PARAM,
  RESERVED_PARAMS,
  SEQUENCE_END_PARAM,
  SEQUENCE_ID_PARAM,
  SEQUENCE_START_PARAM,
  TIMEOUT_PARAM,
} from "../constants.js";
import { InferenceServerError } from "../errors.js";
import { isDatatype, type Datatype, type ParameterValue, type SequenceId } from "../types.js";
import {
  ModelInferRequestSchema,
  type InferParameterInit,
  type InferParameterMessage,
  type ModelInferRequestInit,
  type TensorContentsMessage,
} from "./messages.js";

/** A tensor whose data is already serialized in the raw v2 layout. */
export interface EncodedTensor {
  name: string;
  datatype: Datatype;
  shape: readonly number[];
  raw: Uint8Array;
  parameters?: Record<string, ParameterValue>;
}

export interface InferRequestFields {
  modelName: string;
  modelVersion?: string;
  requestId?: string;
  sequenceId?: SequenceId;
  sequenceStart?: boolean;
  sequenceEnd?: boolean;
  priority?: number;
  /** Server-side timeout in microseconds. */
  timeout?: number;
  parameters?: Record<string, ParameterValue>;
  inputs: readonly EncodedTensor[];
  outputs?: readonly { name: string; parameters?: Record<string, ParameterValue> }[];
}

/** Encode a user-level parameter into the matching `InferParameter` oneof member. */
export function toInferParameter(value: ParameterValue): InferParameterInit {
  if (typeof value === "boolean") return { bool_param: value };
  if (typeof value === "string") return { string_param: value };
  if (Number.isInteger(value)) return { int64_param: String(value) };
  return { double_param: value };
}

function toParameterMap(
  params: Record<string, ParameterValue> | undefined,
): Record<string, InferParameterInit> {
  const out: Record<string, InferParameterInit> = {};
  for (const [key, value] of Object.entries(params ?? {})) {
    out[key] = toInferParameter(value);
  }
  return out;
}

/** True when the ID marks a request as part of a sequence. */
export function isSequenceId(id: SequenceId | undefined | null): id is SequenceId {
  return id !== undefined && id !== null && id !== 0 && id !== "";
}

/**
 * Build a `ModelInferRequest` message. Sequence flags are only attached when
 * the request carries a sequence ID; priority and timeout only when non-zero.
 */
export function encodeInferRequest(fields: InferRequestFields): ModelInferRequestInit {
  for (const key of Object.keys(fields.parameters ?? {})) {
    if (RESERVED_PARAMS.has(key)) {
      throw new InferenceServerError(
        `Parameter "${key}" is a reserved parameter and cannot be specified.`,
      );
    }
  }

  const parameters = toParameterMap(fields.parameters);

  if (isSequenceId(fields.sequenceId)) {
    const id = fields.sequenceId;
    if (typeof id === "number") {
      if (!Number.isSafeInteger(id)) {
        throw new InferenceServerError(`sequence ID ${id} is not an integer`);
      }
      parameters[SEQUENCE_ID_PARAM] = { int64_param: String(id) };
    } else {
      parameters[SEQUENCE_ID_PARAM] = { string_param: id };
    }
    parameters[SEQUENCE_START_PARAM] = { bool_param: fields.sequenceStart ?? false };
    parameters[SEQUENCE_END_PARAM] = { bool_param: fields.sequenceEnd ?? false };
  }
  if (fields.priority) {
    parameters[PRIORITY_PARAM] = { uint64_param: String(fields.priority) };
  }
  if (fields.timeout) {
    parameters[TIMEOUT_PARAM] = { int64_param: String(fields.timeout) };
  }

  return {
    model_name: fields.modelName,
    model_version: fields.modelVersion ?? "",
    id: fields.requestId ?? "",
    parameters,
    inputs: fields.inputs.map((t) => ({
      name: t.name,
      datatype: t.datatype,
      shape: t.shape.map(String),
      parameters: toParameterMap(t.parameters),
    })),
    outputs: (fields.outputs ?? []).map((o) => ({
      name: o.name,
      parameters: toParameterMap(o.parameters),
    })),
    raw_input_contents: fields.inputs.map((t) => t.raw),
  };
}

// ---------------------------------------------------------------------------
// Server side: decoding requests
// ---------------------------------------------------------------------------

/** Read the value of an `InferParameter`, or null when no member is set. */
export function parameterValue(param: InferParameterMessage): ParameterValue | null {
  const choice = param.parameter_choice;
  if (choice) {
    const value = param[choice];
    return value === undefined ? null : value;
  }
  return (
    param.bool_param ??
    param.int64_param ??
    param.string_param ??
    param.double_param ??
    param.uint64_param ??
    null
  );
}

export interface DecodedInput {
  name: string;
  datatype: Datatype;
  shape: number[];
  raw: Uint8Array | null;
  contents: TensorContentsMessage | null;
}

/** A `ModelInferRequest` as seen by a server: sequence control pulled out of the parameters. */
export interface InferRequestView {
  modelName: string;
  modelVersion: string;
  id: string;
  sequenceId: SequenceId | null;
  sequenceStart: boolean;
  sequenceEnd: boolean;
  parameters: Record<string, ParameterValue>;
  inputs: DecodedInput[];
  outputs: string[];
}

/** Validate and decode a deserialized `ModelInferRequest`. */
export function decodeInferRequest(message: unknown): InferRequestView {
  const parsed = ModelInferRequestSchema.safeParse(message);
  if (!parsed.success) {
    throw new InferenceServerError(`malformed inference request: ${parsed.error.message}`);
  }
  const req = parsed.data;

  const parameters: Record<string, ParameterValue> = {};
  for (const [key, param] of Object.entries(req.parameters)) {
    const value = parameterValue(param);
    if (value !== null) parameters[key] = value;
  }

  const rawSequenceId = parameters[SEQUENCE_ID_PARAM];
  let sequenceId: SequenceId | null = null;
  if (typeof rawSequenceId === "number" || typeof rawSequenceId === "string") {
    sequenceId = isSequenceId(rawSequenceId) ? rawSequenceId : null;
  }

  if (req.raw_input_contents.length > 0 && req.raw_input_contents.length !== req.inputs.length) {
    throw new InferenceServerError(
      `expected ${req.inputs.length} raw input contents, got ${req.raw_input_contents.length}`,
    );
  }

  const inputs = req.inputs.map((t, i): DecodedInput => {
    if (!isDatatype(t.datatype)) {
      throw new InferenceServerError(`unsupported datatype ${t.datatype} for input '${t.name}'`);
    }
    return {
      name: t.name,
      datatype: t.datatype,
      shape: t.shape,
      raw: req.raw_input_contents.length > 0 ? req.raw_input_contents[i] : null,
      contents: t.contents ?? null,
    };
  });

  return {
    modelName: req.model_name,
    modelVersion: req.model_version,
    id: req.id,
    sequenceId,
    sequenceStart: parameters[SEQUENCE_START_PARAM] === true,
    sequenceEnd: parameters[SEQUENCE_END_PARAM] === true,
    parameters,
    inputs,
    outputs: req.outputs.map((o) => o.name),
  };
}
