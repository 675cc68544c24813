// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { z } from "zod";

/**
 * Shapes of the messages `@grpc/proto-loader` hands back for the v2 protocol
 * (loaded with keepCase, longs as strings, defaults and oneofs). Incoming
 * messages are validated against these before use.
 */

const Bytes = z.instanceof(Uint8Array);

const Int64 = z
  .union([z.string().regex(/^-?\d+$/), z.number().int()])
  .transform((v) => Number(v))
  .refine(Number.isSafeInteger, { message: "int64 value exceeds the safe integer range" });

const BigInt64 = z
  .union([z.string().regex(/^-?\d+$/), z.number().int()])
  .transform((v) => BigInt(v));

export const InferParameterSchema = z.object({
  bool_param: z.boolean().optional(),
  int64_param: Int64.optional(),
  string_param: z.string().optional(),
  double_param: z.number().optional(),
  uint64_param: Int64.optional(),
  parameter_choice: z
    .enum(["bool_param", "int64_param", "string_param", "double_param", "uint64_param"])
    .optional(),
});

export const TensorContentsSchema = z.object({
  bool_contents: z.array(z.boolean()).default([]),
  int_contents: z.array(z.number().int()).default([]),
  int64_contents: z.array(BigInt64).default([]),
  fp32_contents: z.array(z.number()).default([]),
  fp64_contents: z.array(z.number()).default([]),
  bytes_contents: z.array(Bytes).default([]),
});

const Parameters = z.record(InferParameterSchema).default({});

const TensorSchema = z.object({
  name: z.string(),
  datatype: z.string(),
  shape: z.array(Int64).default([]),
  parameters: Parameters,
  contents: TensorContentsSchema.nullish(),
});

export const ModelInferRequestSchema = z.object({
  model_name: z.string(),
  model_version: z.string().default(""),
  id: z.string().default(""),
  parameters: Parameters,
  inputs: z.array(TensorSchema).default([]),
  outputs: z
    .array(z.object({ name: z.string(), parameters: Parameters }))
    .default([]),
  raw_input_contents: z.array(Bytes).default([]),
});

export const ModelInferResponseSchema = z.object({
  model_name: z.string().default(""),
  model_version: z.string().default(""),
  id: z.string().default(""),
  parameters: Parameters,
  outputs: z.array(TensorSchema).default([]),
  raw_output_contents: z.array(Bytes).default([]),
});

export const ModelStreamInferResponseSchema = z.object({
  error_message: z.string().default(""),
  infer_response: ModelInferResponseSchema.nullish(),
});

export type InferParameterMessage = z.infer<typeof InferParameterSchema>;
export type TensorContentsMessage = z.infer<typeof TensorContentsSchema>;
export type TensorMessage = z.infer<typeof TensorSchema>;
export type ModelInferRequestMessage = z.infer<typeof ModelInferRequestSchema>;
export type ModelInferResponseMessage = z.infer<typeof ModelInferResponseSchema>;

/** Outbound parameter: exactly one member of the `parameter_choice` oneof. */
export type InferParameterInit =
  | { bool_param: boolean }
  | { int64_param: string }
  | { string_param: string }
  | { double_param: number }
  | { uint64_param: string };

export interface TensorInit {
  name: string;
  datatype: string;
  shape: string[];
  parameters: Record<string, InferParameterInit>;
}

export interface ModelInferRequestInit {
  model_name: string;
  model_version: string;
  id: string;
  parameters: Record<string, InferParameterInit>;
  inputs: TensorInit[];
  outputs: { name: string; parameters: Record<string, InferParameterInit> }[];
  raw_input_contents: Uint8Array[];
}

export interface ModelInferResponseInit {
  model_name: string;
  model_version: string;
  id: string;
  parameters: Record<string, InferParameterInit>;
  outputs: TensorInit[];
  raw_output_contents: Uint8Array[];
}

export interface ModelStreamInferResponseInit {
  error_message: string;
  infer_response: ModelInferResponseInit | null;
}
