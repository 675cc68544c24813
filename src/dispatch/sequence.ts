// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { InferenceServerError } from "../errors.js";
import type { SequenceModelDefinition } from "../repository.js";
import type { SequenceId } from "../types.js";
import type { ModelStreamInferResponseInit } from "../wire/messages.js";
import type { DecodedInput, InferRequestView } from "../wire/request.js";
import { encodeStreamResponse } from "../wire/response.js";
import { decodeContents, decodeTensor, encodeTensor } from "../wire/tensor.js";

/** Running sums of the sequences currently in progress, per model and correlation ID. */
export class SequenceStates {
  private _sums: Map<string, number[]> = new Map();

  private static key(model: string, id: SequenceId): string {
    return `${model}/${typeof id}/${id}`;
  }

  get(model: string, id: SequenceId): number[] | undefined {
    return this._sums.get(SequenceStates.key(model, id));
  }

  set(model: string, id: SequenceId, sums: number[]): void {
    this._sums.set(SequenceStates.key(model, id), sums);
  }

  release(model: string, id: SequenceId): void {
    this._sums.delete(SequenceStates.key(model, id));
  }

  /** Sequences started and not yet ended. */
  get size(): number {
    return this._sums.size;
  }
}

function int32Values(input: DecodedInput): number[] {
  if (input.datatype !== "INT32") {
    throw new InferenceServerError(
      `input '${input.name}' has datatype ${input.datatype}, expected INT32`,
    );
  }
  const tensor = input.raw
    ? decodeTensor(input.datatype, input.raw)
    : input.contents
      ? decodeContents(input.datatype, input.contents)
      : null;
  if (!tensor || tensor.datatype !== "INT32") {
    throw new InferenceServerError(`input '${input.name}' carries no data`);
  }
  return Array.from(tensor.values);
}

function correlationInt(id: SequenceId, model: string): number {
  if (typeof id === "number") return id;
  if (!/^-?\d+$/.test(id)) {
    throw new InferenceServerError(
      `model '${model}' requires an integer-valued correlation ID, got '${id}'`,
    );
  }
  return Number.parseInt(id, 10);
}

/**
 * Run one request of a sequence against an accumulator model. A start
 * request resets the sequence's sums; an end request releases them.
 */
export function dispatchSequence(
  model: SequenceModelDefinition,
  request: InferRequestView,
  states: SequenceStates,
): ModelStreamInferResponseInit {
  const id = request.sequenceId;
  if (id === null) {
    throw new InferenceServerError(
      `inference request to model '${model.name}' must specify a non-zero or non-empty correlation ID`,
    );
  }
  const correlation = model.dyna ? correlationInt(id, model.name) : 0;

  const input = request.inputs.find((i) => i.name === model.inputName);
  if (!input) {
    throw new InferenceServerError(`expected input '${model.inputName}' for model '${model.name}'`);
  }
  const values = int32Values(input);

  const previous = request.sequenceStart ? undefined : states.get(model.name, id);
  if (!request.sequenceStart && !previous) {
    throw new InferenceServerError(
      `inference request for sequence ${id} to model '${model.name}' must specify the START flag on the first request of the sequence`,
    );
  }
  const sums = values.map((v, i) => (previous?.[i] ?? 0) + v);

  if (request.sequenceEnd) {
    states.release(model.name, id);
  } else {
    states.set(model.name, id, sums);
  }

  const output = model.dyna && request.sequenceEnd ? sums.map((s) => s + correlation) : sums;

  return encodeStreamResponse({
    modelName: model.name,
    modelVersion: request.modelVersion,
    id: request.id,
    outputs: [
      {
        name: model.outputName,
        datatype: "INT32",
        shape: input.shape,
        raw: encodeTensor("INT32", output),
      },
    ],
  });
}
