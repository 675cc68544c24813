// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

/** Well-known names of the v2 inference protocol and the sequence models. */

export const DEFAULT_URL = "localhost:8001";
export const URL_ENV_VAR = "INFER_SERVER_URL";

export const SERVICE_NAME = "inference.GRPCInferenceService";
export const STREAM_INFER_METHOD = "ModelStreamInfer";

export const SEQUENCE_ID_PARAM = "sequence_id";
export const SEQUENCE_START_PARAM = "sequence_start";
export const SEQUENCE_END_PARAM = "sequence_end";
export const PRIORITY_PARAM = "priority";
export const TIMEOUT_PARAM = "timeout";

/** Request parameters the client sets itself; callers may not pass them directly. */
export const RESERVED_PARAMS: ReadonlySet<string> = new Set([
  SEQUENCE_ID_PARAM,
  SEQUENCE_START_PARAM,
  SEQUENCE_END_PARAM,
  PRIORITY_PARAM,
  TIMEOUT_PARAM,
]);

/** Request IDs are `<sequence id><separator><1-based index>`. */
export const REQUEST_ID_SEPARATOR = "_";

export const INPUT_NAME = "INPUT";
export const OUTPUT_NAME = "OUTPUT";

export const SEQUENCE_MODEL = "simple_sequence";
export const DYNA_SEQUENCE_MODEL = "simple_dyna_sequence";
export const STRING_DYNA_SEQUENCE_MODEL = "simple_string_dyna_sequence";

export const SEQUENCE_VALUES: readonly number[] = [11, 7, 5, 3, 2, 0, 1, 19];
