// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import type { Vector } from "apache-arrow";
import { InferenceServerError } from "../errors.js";
import {
  isDatatype,
  type Datatype,
  type ParameterValue,
  type TensorElement,
} from "../types.js";
import type { ModelInferResponseMessage, TensorMessage } from "../wire/messages.js";
import { parameterValue, type EncodedTensor } from "../wire/request.js";
import {
  decodeContents,
  decodeTensor,
  elementCount,
  encodeTensor,
  tensorToArray,
  tensorToVector,
  type DecodedTensor,
} from "../wire/tensor.js";

/** An input tensor of an inference request. */
export class InferInput {
  private readonly _shape: number[];
  private _raw: Uint8Array | null = null;

  constructor(
    readonly name: string,
    shape: readonly number[],
    readonly datatype: Datatype,
  ) {
    this._shape = [...shape];
  }

  get shape(): readonly number[] {
    return this._shape;
  }

  /**
   * Set the tensor data, in row-major order. The element count must match
   * the shape.
   */
  setData(values: Iterable<TensorElement>): this {
    const elements = Array.from(values);
    const expected = elementCount(this._shape);
    if (elements.length !== expected) {
      throw new InferenceServerError(
        `got unexpected number of elements in input '${this.name}', expected ${expected}, got ${elements.length}`,
      );
    }
    this._raw = encodeTensor(this.datatype, elements);
    return this;
  }

  /** @internal */
  toTensor(): EncodedTensor {
    if (!this._raw) {
      throw new InferenceServerError(`input '${this.name}' has no data; call setData() first`);
    }
    return {
      name: this.name,
      datatype: this.datatype,
      shape: this._shape,
      raw: this._raw,
    };
  }
}

/** An output the server is asked to return. */
export class InferRequestedOutput {
  constructor(readonly name: string) {}
}

/** One inference response received from the server. */
export class InferResult {
  constructor(private readonly _response: ModelInferResponseMessage) {}

  get id(): string {
    return this._response.id;
  }

  get modelName(): string {
    return this._response.model_name;
  }

  get modelVersion(): string {
    return this._response.model_version;
  }

  getOutput(name: string): TensorMessage | null {
    return this._response.outputs.find((o) => o.name === name) ?? null;
  }

  getParameter(name: string): ParameterValue | null {
    const param = this._response.parameters[name];
    return param ? parameterValue(param) : null;
  }

  /** Decoded output data as a flat array, or null when the response has no such output. */
  asArray(name: string): TensorElement[] | null {
    const tensor = this._decode(name);
    return tensor ? tensorToArray(tensor) : null;
  }

  /** Decoded output data as an Arrow vector, or null when the response has no such output. */
  asVector(name: string): Vector | null {
    const tensor = this._decode(name);
    return tensor ? tensorToVector(tensor) : null;
  }

  private _decode(name: string): DecodedTensor | null {
    const index = this._response.outputs.findIndex((o) => o.name === name);
    if (index < 0) return null;
    const output = this._response.outputs[index];
    if (!isDatatype(output.datatype)) {
      throw new InferenceServerError(`unsupported datatype ${output.datatype} for output '${name}'`);
    }
    const raw = this._response.raw_output_contents;
    if (raw.length > 0) {
      if (index >= raw.length) {
        throw new InferenceServerError(`missing raw contents for output '${name}'`);
      }
      return decodeTensor(output.datatype, raw[index]);
    }
    if (output.contents) {
      return decodeContents(output.datatype, output.contents);
    }
    return decodeTensor(output.datatype, new Uint8Array(0));
  }
}
