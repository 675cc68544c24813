// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

/** Identifier shared by every request of one sequence. `0` and `""` mean "no sequence". */
export type SequenceId = number | string;

/** Tensor element types carried by this client. */
export type Datatype = "BOOL" | "INT32" | "INT64" | "FP32" | "FP64" | "BYTES";

export const DATATYPES: readonly Datatype[] = ["BOOL", "INT32", "INT64", "FP32", "FP64", "BYTES"];

export function isDatatype(value: string): value is Datatype {
  return DATATYPES.some((d) => d === value);
}

/** A single tensor element as accepted by `InferInput.setData`. */
export type TensorElement = number | bigint | boolean | string;

/** Value of a request or response parameter. */
export type ParameterValue = boolean | number | string;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogMessage {
  level: LogLevel;
  message: string;
  extra?: Record<string, unknown>;
}

export type LogFn = (msg: LogMessage) => void;
