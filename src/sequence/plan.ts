// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { v4 as uuidv4 } from "uuid";
import {
  DYNA_SEQUENCE_MODEL,
  SEQUENCE_MODEL,
  SEQUENCE_VALUES,
  STRING_DYNA_SEQUENCE_MODEL,
} from "../constants.js";
import { ConfigError } from "../errors.js";
import type { SequenceId } from "../types.js";

/** One sequence to send: its correlation ID, target model and ordered inputs. */
export interface PlannedSequence {
  label: string;
  id: SequenceId;
  modelName: string;
  values: readonly number[];
}

export interface SequencePlan {
  sequences: readonly PlannedSequence[];
  dyna: boolean;
  batchSize: number;
  modelVersion: string;
}

export interface PlanOptions {
  /** Target the dyna models, which fold the correlation ID into the last output. */
  dyna?: boolean;
  /** Shifts every sequence ID; never the inputs. */
  offset?: number;
  /** Use this model for all three sequences instead of the defaults. */
  modelName?: string | null;
  values?: readonly number[];
  batchSize?: number;
  modelVersion?: string;
  /** Source of the string sequence ID outside dyna mode. */
  uuid?: () => string;
}

/**
 * Lay out the three sequences of a check: two integer-identified and one
 * string-identified, sharing the base values.
 */
export function buildSequencePlan(options: PlanOptions = {}): SequencePlan {
  const dyna = options.dyna ?? false;
  const offset = options.offset ?? 0;
  const values = options.values ?? SEQUENCE_VALUES;
  const batchSize = options.batchSize ?? 1;

  if (!Number.isInteger(offset)) {
    throw new ConfigError(`offset must be an integer, got ${offset}`);
  }
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigError(`batch size must be a positive integer, got ${batchSize}`);
  }

  const intModel = options.modelName ?? (dyna ? DYNA_SEQUENCE_MODEL : SEQUENCE_MODEL);
  const stringModel = options.modelName ?? (dyna ? STRING_DYNA_SEQUENCE_MODEL : SEQUENCE_MODEL);

  // Zero is reserved for requests outside any sequence.
  const intId0 = 1000 + offset * 2;
  const intId1 = 1001 + offset * 2;
  if (intId0 === 0 || intId1 === 0) {
    throw new ConfigError(`offset ${offset} yields the reserved sequence ID 0`);
  }

  // The dyna string model needs an ID that decodes to an integer.
  const stringId = dyna ? String(1002 + offset) : (options.uuid ?? uuidv4)();

  const negated = values.map((v) => -v);

  const sequences: PlannedSequence[] = [
    { label: "seq0", id: intId0, modelName: intModel, values: [0, ...values] },
    { label: "seq1", id: intId1, modelName: intModel, values: [100, ...negated] },
    { label: "seq2", id: stringId, modelName: stringModel, values: [20, ...negated] },
  ];

  // Results are routed back by model and the text of the ID.
  const seen = new Map<string, string>();
  for (const seq of sequences) {
    const route = sequenceRoute(seq.modelName, String(seq.id));
    const other = seen.get(route);
    if (other !== undefined) {
      throw new ConfigError(
        `sequences ${other} and ${seq.label} both use ID '${seq.id}' on model '${seq.modelName}'; choose another offset`,
      );
    }
    seen.set(route, seq.label);
  }

  return {
    dyna,
    batchSize,
    modelVersion: options.modelVersion ?? "",
    sequences,
  };
}

/** Routing key of a sequence's results: its model and the text of its ID. */
export function sequenceRoute(modelName: string, key: string): string {
  return `${modelName}/${key}`;
}

/** Number of requests (and therefore results) in a plan. */
export function totalRequests(plan: SequencePlan): number {
  return plan.sequences.reduce((n, seq) => n + seq.values.length, 0);
}
