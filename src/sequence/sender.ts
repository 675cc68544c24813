// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { INPUT_NAME, OUTPUT_NAME, REQUEST_ID_SEPARATOR } from "../constants.js";
import { InferInput, InferRequestedOutput } from "../client/infer.js";
import type { AsyncStreamInferOptions } from "../client/types.js";
import type { SequenceId } from "../types.js";
import type { PlannedSequence } from "./plan.js";

/** The part of the client a sender writes through. */
export interface StreamInferTarget {
  asyncStreamInfer(options: AsyncStreamInferOptions): void;
}

export interface SendOptions {
  batchSize?: number;
  modelVersion?: string;
  print?: (line: string) => void;
}

/** `<sequence id>_<1-based index>`, the key results are routed back by. */
export function sequenceRequestId(sequenceId: SequenceId, count: number): string {
  return `${sequenceId}${REQUEST_ID_SEPARATOR}${count}`;
}

/**
 * Write one request per value of the sequence, flagging the first as the
 * sequence start and the last as its end. Transport errors propagate.
 */
export function asyncStreamSend(
  client: StreamInferTarget,
  sequence: PlannedSequence,
  options: SendOptions = {},
): number {
  const batchSize = options.batchSize ?? 1;
  const last = sequence.values.length;

  sequence.values.forEach((value, i) => {
    const count = i + 1;
    const start = count === 1;
    const end = count === last;

    const input = new InferInput(INPUT_NAME, [batchSize, 1], "INT32");
    input.setData(new Array<number>(batchSize).fill(value));

    client.asyncStreamInfer({
      modelName: sequence.modelName,
      modelVersion: options.modelVersion,
      inputs: [input],
      outputs: [new InferRequestedOutput(OUTPUT_NAME)],
      requestId: sequenceRequestId(sequence.id, count),
      sequenceId: sequence.id,
      sequenceStart: start,
      sequenceEnd: end,
    });

    const rows = JSON.stringify(new Array<number[]>(batchSize).fill([value]));
    options.print?.(
      `[model_name] ${sequence.modelName}, [sequence_id] ${sequence.id}, ` +
        `[start:${start}|end:${end}], [input_value] ${rows}`,
    );
  });

  return last;
}
