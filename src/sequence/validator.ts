// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { tableFromArrays, type Table } from "apache-arrow";
import { ConfigError, SequenceMismatchError, SequenceProtocolError } from "../errors.js";
import type { SequenceId } from "../types.js";
import type { CollectedOutputs } from "./collector.js";
import type { PlannedSequence, SequencePlan } from "./plan.js";

export interface ValidationReport {
  steps: number;
  /**
   * One row per step: `step`, then `<label>_expected` and `<label>_actual`
   * for every sequence of the plan.
   */
  table: Table;
}

export interface ValidateOptions {
  print?: (line: string) => void;
}

/** Integer value of a correlation ID, as the dyna models fold it into the last output. */
export function correlationValue(id: SequenceId): number {
  if (typeof id === "number") return id;
  if (!/^-?\d+$/.test(id)) {
    throw new SequenceProtocolError(`correlation ID '${id}' is not an integer`);
  }
  return Number.parseInt(id, 10);
}

/**
 * Outputs a sequence model should return: the running sum of the inputs,
 * plus the correlation ID on the last request when `dyna` is set.
 */
export function expectedOutputs(sequence: PlannedSequence, dyna: boolean): number[] {
  const last = sequence.values.length - 1;
  let sum = 0;
  return sequence.values.map((value, i) => {
    sum += value;
    return dyna && i === last ? sum + correlationValue(sequence.id) : sum;
  });
}

/**
 * Compare received outputs against the expected accumulation, step by step
 * across all sequences. Prints `[i] a : b : c` per step; the first mismatch
 * prints the expected triple and throws.
 */
export function validateSequences(
  plan: SequencePlan,
  received: CollectedOutputs,
  options: ValidateOptions = {},
): ValidationReport {
  const print = options.print ?? (() => {});

  const expected = plan.sequences.map((seq) => expectedOutputs(seq, plan.dyna));
  const actual = plan.sequences.map((seq) => {
    const outputs = received.get(seq.label) ?? [];
    if (outputs.length !== seq.values.length) {
      throw new SequenceProtocolError(
        `sequence ${seq.id} returned ${outputs.length} results for ${seq.values.length} requests`,
      );
    }
    return outputs;
  });

  const steps = plan.sequences.length > 0 ? plan.sequences[0].values.length : 0;
  if (plan.sequences.some((seq) => seq.values.length !== steps)) {
    throw new ConfigError("all sequences of a plan must have the same number of values");
  }
  for (let i = 0; i < steps; i++) {
    const want = expected.map((values) => values[i]);
    const got = actual.map((values) => values[i]);
    print(`[${i}] ${got.join(" : ")}`);
    if (want.some((w, s) => w !== got[s])) {
      print(`[ expected ] ${want.join(" : ")}`);
      throw new SequenceMismatchError(i, want, got);
    }
  }

  const columns: Record<string, Int32Array | Float64Array> = {
    step: Int32Array.from({ length: steps }, (_, i) => i),
  };
  plan.sequences.forEach((seq, s) => {
    columns[`${seq.label}_expected`] = Float64Array.from(expected[s]);
    columns[`${seq.label}_actual`] = Float64Array.from(actual[s]);
  });

  return { steps, table: tableFromArrays(columns) };
}
