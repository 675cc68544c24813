// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import {
  DYNA_SEQUENCE_MODEL,
  INPUT_NAME,
  OUTPUT_NAME,
  SEQUENCE_MODEL,
  STRING_DYNA_SEQUENCE_MODEL,
} from "./constants.js";

export interface SequenceModelDefinition {
  name: string;
  /** Add the integer correlation ID to the output of the sequence's last request. */
  dyna: boolean;
  inputName: string;
  outputName: string;
  doc?: string;
}

/**
 * Fluent builder for the models a `SequenceInferenceServer` serves.
 */
export class ModelRepository {
  private _models: Map<string, SequenceModelDefinition> = new Map();

  /**
   * Register an accumulator: each request adds its INT32 input to the
   * sequence's running sum and returns the sum.
   */
  accumulator(
    name: string,
    config: { dyna?: boolean; inputName?: string; outputName?: string; doc?: string } = {},
  ): this {
    this._models.set(name, {
      name,
      dyna: config.dyna ?? false,
      inputName: config.inputName ?? INPUT_NAME,
      outputName: config.outputName ?? OUTPUT_NAME,
      doc: config.doc,
    });
    return this;
  }

  get(name: string): SequenceModelDefinition | undefined {
    return this._models.get(name);
  }

  getModels(): ReadonlyMap<string, SequenceModelDefinition> {
    return this._models;
  }

  /** The plain and dyna accumulators the sequence check targets by default. */
  static withSequenceModels(): ModelRepository {
    return new ModelRepository()
      .accumulator(SEQUENCE_MODEL, { doc: "Running sum of the inputs of a sequence." })
      .accumulator(DYNA_SEQUENCE_MODEL, {
        dyna: true,
        doc: "Running sum; the last output also adds the correlation ID.",
      })
      .accumulator(STRING_DYNA_SEQUENCE_MODEL, {
        dyna: true,
        doc: "Dyna accumulator addressed by integer-valued string correlation IDs.",
      });
  }
}
