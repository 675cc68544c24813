// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { Bool, Utf8, makeVector, vectorFromArray, type Vector } from "apache-arrow";
import { InferenceServerError } from "../errors.js";
import type { Datatype, TensorElement } from "../types.js";
import type { TensorContentsMessage } from "./messages.js";

/** Tensor data decoded into the natural JS container for its datatype. */
export type DecodedTensor =
  | { datatype: "BOOL"; values: boolean[] }
  | { datatype: "INT32"; values: Int32Array }
  | { datatype: "INT64"; values: BigInt64Array }
  | { datatype: "FP32"; values: Float32Array }
  | { datatype: "FP64"; values: Float64Array }
  | { datatype: "BYTES"; values: string[] };

const ELEMENT_SIZE: Record<Exclude<Datatype, "BYTES">, number> = {
  BOOL: 1,
  INT32: 4,
  INT64: 8,
  FP32: 4,
  FP64: 8,
};

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Number of elements in a tensor of the given shape. A scalar shape `[]` holds one. */
export function elementCount(shape: readonly number[]): number {
  return shape.reduce((n, dim) => n * dim, 1);
}

function expectNumber(value: TensorElement, datatype: Datatype): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  throw new InferenceServerError(`unexpected ${typeof value} element for ${datatype} tensor`);
}

function expectInt32(value: TensorElement): number {
  const n = expectNumber(value, "INT32");
  if (!Number.isInteger(n) || n < -0x80000000 || n > 0x7fffffff) {
    throw new InferenceServerError(`value ${String(value)} does not fit an INT32 tensor`);
  }
  return n;
}

function expectInt64(value: TensorElement): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  throw new InferenceServerError(`value ${String(value)} does not fit an INT64 tensor`);
}

/**
 * Serialize tensor elements into the raw little-endian layout of the v2
 * protocol. `BYTES` elements are each prefixed by a 4-byte length.
 */
export function encodeTensor(datatype: Datatype, values: readonly TensorElement[]): Uint8Array {
  if (datatype === "BYTES") {
    const parts = values.map((v) => {
      if (typeof v !== "string") {
        throw new InferenceServerError(`unexpected ${typeof v} element for BYTES tensor`);
      }
      return encoder.encode(v);
    });
    const total = parts.reduce((n, p) => n + 4 + p.byteLength, 0);
    const out = new Uint8Array(total);
    const view = new DataView(out.buffer);
    let offset = 0;
    for (const part of parts) {
      view.setUint32(offset, part.byteLength, true);
      out.set(part, offset + 4);
      offset += 4 + part.byteLength;
    }
    return out;
  }

  const size = ELEMENT_SIZE[datatype];
  const out = new Uint8Array(values.length * size);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => {
    const offset = i * size;
    switch (datatype) {
      case "BOOL":
        if (typeof v !== "boolean") {
          throw new InferenceServerError(`unexpected ${typeof v} element for BOOL tensor`);
        }
        view.setUint8(offset, v ? 1 : 0);
        break;
      case "INT32":
        view.setInt32(offset, expectInt32(v), true);
        break;
      case "INT64":
        view.setBigInt64(offset, expectInt64(v), true);
        break;
      case "FP32":
        view.setFloat32(offset, expectNumber(v, datatype), true);
        break;
      case "FP64":
        view.setFloat64(offset, expectNumber(v, datatype), true);
        break;
    }
  });
  return out;
}

/** Decode raw tensor bytes as written by `encodeTensor` or a v2 server. */
export function decodeTensor(datatype: Datatype, raw: Uint8Array): DecodedTensor {
  const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);

  if (datatype === "BYTES") {
    const values: string[] = [];
    let offset = 0;
    while (offset < raw.byteLength) {
      if (offset + 4 > raw.byteLength) {
        throw new InferenceServerError("truncated length prefix in BYTES tensor");
      }
      const len = view.getUint32(offset, true);
      const end = offset + 4 + len;
      if (end > raw.byteLength) {
        throw new InferenceServerError("truncated element in BYTES tensor");
      }
      values.push(decoder.decode(raw.subarray(offset + 4, end)));
      offset = end;
    }
    return { datatype, values };
  }

  const size = ELEMENT_SIZE[datatype];
  if (raw.byteLength % size !== 0) {
    throw new InferenceServerError(
      `${datatype} tensor of ${raw.byteLength} bytes is not a whole number of ${size}-byte elements`,
    );
  }
  const count = raw.byteLength / size;

  switch (datatype) {
    case "BOOL": {
      const values: boolean[] = [];
      for (let i = 0; i < count; i++) values.push(view.getUint8(i) !== 0);
      return { datatype, values };
    }
    case "INT32": {
      const values = new Int32Array(count);
      for (let i = 0; i < count; i++) values[i] = view.getInt32(i * size, true);
      return { datatype, values };
    }
    case "INT64": {
      const values = new BigInt64Array(count);
      for (let i = 0; i < count; i++) values[i] = view.getBigInt64(i * size, true);
      return { datatype, values };
    }
    case "FP32": {
      const values = new Float32Array(count);
      for (let i = 0; i < count; i++) values[i] = view.getFloat32(i * size, true);
      return { datatype, values };
    }
    case "FP64": {
      const values = new Float64Array(count);
      for (let i = 0; i < count; i++) values[i] = view.getFloat64(i * size, true);
      return { datatype, values };
    }
  }
}

/** Decode the typed `contents` field used when a tensor is not sent raw. */
export function decodeContents(datatype: Datatype, contents: TensorContentsMessage): DecodedTensor {
  switch (datatype) {
    case "BOOL":
      return { datatype, values: [...contents.bool_contents] };
    case "INT32":
      return { datatype, values: Int32Array.from(contents.int_contents) };
    case "INT64":
      return { datatype, values: BigInt64Array.from(contents.int64_contents) };
    case "FP32":
      return { datatype, values: Float32Array.from(contents.fp32_contents) };
    case "FP64":
      return { datatype, values: Float64Array.from(contents.fp64_contents) };
    case "BYTES":
      return { datatype, values: contents.bytes_contents.map((b) => decoder.decode(b)) };
  }
}

/** Plain array view of decoded tensor data. */
export function tensorToArray(tensor: DecodedTensor): TensorElement[] {
  return Array.from<TensorElement>(tensor.values);
}

/** Arrow vector view of decoded tensor data. */
export function tensorToVector(tensor: DecodedTensor): Vector {
  switch (tensor.datatype) {
    case "BOOL":
      return vectorFromArray(tensor.values, new Bool());
    case "BYTES":
      return vectorFromArray(tensor.values, new Utf8());
    case "INT32":
      return makeVector(tensor.values);
    case "INT64":
      return makeVector(tensor.values);
    case "FP32":
      return makeVector(tensor.values);
    case "FP64":
      return makeVector(tensor.values);
  }
}
