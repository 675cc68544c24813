// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { OUTPUT_NAME, REQUEST_ID_SEPARATOR } from "../constants.js";
import type { InferResult } from "../client/infer.js";
import type { CompletionQueue } from "../client/queue.js";
import { InferenceServerError, SequenceProtocolError } from "../errors.js";
import { sequenceRoute, totalRequests, type SequencePlan } from "./plan.js";

/** What a stream callback leaves on the completion queue. */
export type StreamItem = InferResult | InferenceServerError;

/** Received outputs, per sequence label, in arrival order. */
export type CollectedOutputs = Map<string, number[]>;

export interface CollectOptions {
  /** Stop waiting after this many items instead of the plan's request count. */
  expected?: number;
  /** Give up if a single item takes longer than this to arrive. */
  itemTimeoutMs?: number;
}

/** The sequence key of a result: its request ID up to the first separator. */
export function sequenceKeyOf(requestId: string): string {
  const idx = requestId.indexOf(REQUEST_ID_SEPARATOR);
  return idx < 0 ? requestId : requestId.slice(0, idx);
}

/** First element of the result's OUTPUT tensor. */
export function scalarOutput(result: InferResult): number {
  const values = result.asArray(OUTPUT_NAME);
  if (!values || values.length === 0) {
    throw new SequenceProtocolError(`result ${result.id} carries no ${OUTPUT_NAME} data`);
  }
  const [value] = values;
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  throw new SequenceProtocolError(
    `result ${result.id} has a non-numeric ${OUTPUT_NAME} element: ${String(value)}`,
  );
}

/**
 * Drain the queue until every request of the plan has a result, routing each
 * output to its sequence by model name and request-ID prefix. The first error item ends collection by throwing it.
 */
export async function collectResults(
  queue: CompletionQueue<StreamItem>,
  plan: SequencePlan,
  options: CollectOptions = {},
): Promise<CollectedOutputs> {
  const expected = options.expected ?? totalRequests(plan);

  const labelByRoute = new Map<string, string>();
  const outputs: CollectedOutputs = new Map();
  for (const seq of plan.sequences) {
    labelByRoute.set(sequenceRoute(seq.modelName, String(seq.id)), seq.label);
    outputs.set(seq.label, []);
  }

  for (let received = 0; received < expected; received++) {
    const item = await queue.get(options.itemTimeoutMs);
    if (item instanceof InferenceServerError) {
      throw item;
    }

    const key = sequenceKeyOf(item.id);
    const label = labelByRoute.get(sequenceRoute(item.modelName, key));
    const list = label === undefined ? undefined : outputs.get(label);
    if (!list) {
      throw new SequenceProtocolError(
        `unexpected sequence id returned by the server: ${key} (model '${item.modelName}')`,
      );
    }
    list.push(scalarOutput(item));
  }

  return outputs;
}
