// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { InferResult } from "../../src/client/infer.js";
import type { CliIo } from "../../src/cli/main.js";
import { SequenceInferenceServer, type SequenceServerOptions } from "../../src/server.js";
import { decodeStreamResponse, encodeStreamResponse } from "../../src/wire/response.js";
import { encodeTensor } from "../../src/wire/tensor.js";

/** Start a reference server on an ephemeral loopback port. */
export async function startServer(
  options?: SequenceServerOptions,
): Promise<{ server: SequenceInferenceServer; url: string }> {
  const server = new SequenceInferenceServer(options);
  const port = await server.listen("127.0.0.1:0");
  return { server, url: `127.0.0.1:${port}` };
}

/** A loopback address nothing listens on. */
export async function unusedUrl(): Promise<string> {
  const { server, url } = await startServer();
  server.forceShutdown();
  return url;
}

/** An INT32 OUTPUT result as the server would return it. */
export function int32Result(
  id: string,
  values: number[],
  modelName = "simple_sequence",
): InferResult {
  return new InferResult(
    decodeStreamResponse(
      encodeStreamResponse({
        modelName,
        id,
        outputs: [
          {
            name: "OUTPUT",
            datatype: "INT32",
            shape: [values.length, 1],
            raw: encodeTensor("INT32", values),
          },
        ],
      }),
    ),
  );
}

export function captureIo(): { io: CliIo; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    },
    out,
    err,
  };
}
