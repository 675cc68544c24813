// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { fileURLToPath } from "node:url";
import * as protoLoader from "@grpc/proto-loader";
import { SERVICE_NAME, STREAM_INFER_METHOD } from "../constants.js";

export const PROTO_PATH = fileURLToPath(new URL("../../proto/grpc_service.proto", import.meta.url));

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

let serviceCache: protoLoader.ServiceDefinition | null = null;

function isServiceDefinition(
  def: protoLoader.AnyDefinition,
): def is protoLoader.ServiceDefinition {
  return !("format" in def);
}

/** Load the `GRPCInferenceService` definition from the bundled proto (once per process). */
export function loadInferenceService(): protoLoader.ServiceDefinition {
  if (serviceCache) return serviceCache;
  const pkg = protoLoader.loadSync(PROTO_PATH, LOADER_OPTIONS);
  const def = pkg[SERVICE_NAME];
  if (!def || !isServiceDefinition(def)) {
    throw new Error(`${SERVICE_NAME} is not a service in ${PROTO_PATH}`);
  }
  serviceCache = def;
  return def;
}

/** The bidirectional `ModelStreamInfer` method: path plus (de)serializers. */
export function streamInferMethod(): protoLoader.MethodDefinition<object, object> {
  const method = loadInferenceService()[STREAM_INFER_METHOD];
  if (!method || !method.requestStream || !method.responseStream) {
    throw new Error(`${SERVICE_NAME}/${STREAM_INFER_METHOD} is not a bidirectional stream`);
  }
  return method;
}
