// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { Server, ServerCredentials, type ServerDuplexStream } from "@grpc/grpc-js";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { InferenceServerClient } from "../src/client/grpc.js";
import { InferInput, InferRequestedOutput, InferResult } from "../src/client/infer.js";
import { CompletionQueue } from "../src/client/queue.js";
import { InferenceServerError } from "../src/errors.js";
import type { SequenceInferenceServer } from "../src/server.js";
import type { StreamItem } from "../src/sequence/collector.js";
import type { LogMessage } from "../src/types.js";
import { loadInferenceService, streamInferMethod } from "../src/wire/proto.js";
import { decodeStreamResponse, encodeStreamResponse } from "../src/wire/response.js";
import { encodeTensor } from "../src/wire/tensor.js";
import { startServer, unusedUrl } from "./support/helpers.js";

function input(value: number): InferInput {
  return new InferInput("INPUT", [1, 1], "INT32").setData([value]);
}

function queueCallback(queue: CompletionQueue<StreamItem>) {
  return (result: StreamItem | null, error: InferenceServerError | null) => {
    if (error) queue.put(error);
    else if (result) queue.put(result);
  };
}

/** Send a one-request sequence and wait for its result. */
async function inferOnce(
  client: InferenceServerClient,
  queue: CompletionQueue<StreamItem>,
  sequenceId: number,
  value: number,
): Promise<InferResult> {
  client.asyncStreamInfer({
    modelName: "simple_sequence",
    inputs: [input(value)],
    requestId: `${sequenceId}_1`,
    sequenceId,
    sequenceStart: true,
    sequenceEnd: true,
  });
  const item = await queue.get(5_000);
  if (item instanceof InferenceServerError) throw item;
  return item;
}

describe("InferResult", () => {
  it("reads response parameters", () => {
    const method = streamInferMethod();
    const message = encodeStreamResponse({
      modelName: "simple_sequence",
      id: "1_1",
      parameters: { sequence_end: true, batch: 2, note: "ok" },
      outputs: [],
    });
    const result = new InferResult(
      decodeStreamResponse(method.responseDeserialize(method.responseSerialize(message))),
    );
    expect(result.getParameter("sequence_end")).toBe(true);
    expect(result.getParameter("batch")).toBe(2);
    expect(result.getParameter("note")).toBe("ok");
    expect(result.getParameter("missing")).toBeNull();
  });

  it("returns null for an output the response does not carry", () => {
    const result = new InferResult(
      decodeStreamResponse(
        encodeStreamResponse({
          modelName: "m",
          outputs: [{ name: "OUTPUT", datatype: "INT32", shape: [1], raw: encodeTensor("INT32", [1]) }],
        }),
      ),
    );
    expect(result.asArray("OTHER")).toBeNull();
    expect(result.asVector("OTHER")).toBeNull();
    expect(result.getOutput("OUTPUT")?.datatype).toBe("INT32");
  });
});

describe("InferInput", () => {
  it("checks the element count against the shape", () => {
    expect(() => new InferInput("INPUT", [2, 1], "INT32").setData([1])).toThrow(
      "got unexpected number of elements in input 'INPUT', expected 2, got 1",
    );
  });

  it("requires data before it is sent", () => {
    expect(() => new InferInput("INPUT", [1], "INT32").toTensor()).toThrow(
      "input 'INPUT' has no data; call setData() first",
    );
  });
});

describe("InferenceServerClient", () => {
  let server: SequenceInferenceServer;
  let url: string;
  let client: InferenceServerClient;

  beforeEach(async () => {
    ({ server, url } = await startServer());
    client = new InferenceServerClient({ url, onLog: () => {} });
  });

  afterEach(async () => {
    await client.close();
    server.forceShutdown();
  });

  it("rejects a URL with a scheme", () => {
    expect(() => new InferenceServerClient({ url: "http://localhost:8001" })).toThrow(
      "url should not include the scheme, got 'http://localhost:8001'",
    );
  });

  it("streams requests and delivers results in order", async () => {
    const queue = new CompletionQueue<StreamItem>();
    client.startStream({ callback: queueCallback(queue) });
    expect(client.streaming).toBe(true);

    const sends = [
      { value: 0, start: true, end: false },
      { value: 11, start: false, end: false },
      { value: 7, start: false, end: true },
    ];
    sends.forEach((send, i) => {
      client.asyncStreamInfer({
        modelName: "simple_sequence",
        inputs: [input(send.value)],
        outputs: [new InferRequestedOutput("OUTPUT")],
        requestId: `1000_${i + 1}`,
        sequenceId: 1000,
        sequenceStart: send.start,
        sequenceEnd: send.end,
      });
    });

    const received: Array<[string, number | undefined]> = [];
    for (let i = 0; i < sends.length; i++) {
      const item = await queue.get(5_000);
      if (item instanceof InferenceServerError) throw item;
      const [value] = item.asArray("OUTPUT") ?? [];
      received.push([item.id, typeof value === "number" ? value : undefined]);
    }
    expect(received).toEqual([
      ["1000_1", 0],
      ["1000_2", 11],
      ["1000_3", 18],
    ]);

    await client.stopStream();
    expect(client.streaming).toBe(false);
    expect(server.openSequences).toBe(0);
  });

  it("delivers in-band errors and keeps the stream open", async () => {
    const queue = new CompletionQueue<StreamItem>();
    client.startStream({ callback: queueCallback(queue) });

    client.asyncStreamInfer({ modelName: "missing", inputs: [input(1)], sequenceId: 1, sequenceStart: true });
    const error = await queue.get(5_000);
    expect(error).toBeInstanceOf(InferenceServerError);
    expect(error instanceof InferenceServerError && error.message).toBe(
      "Request for unknown model: 'missing' is not found",
    );

    client.asyncStreamInfer({
      modelName: "simple_sequence",
      inputs: [input(4)],
      requestId: "2_1",
      sequenceId: 2,
      sequenceStart: true,
      sequenceEnd: true,
    });
    const result = await queue.get(5_000);
    expect(result instanceof InferenceServerError ? null : result.id).toBe("2_1");
  });

  it("exposes a streamed output as an Arrow vector", async () => {
    const queue = new CompletionQueue<StreamItem>();
    client.startStream({ callback: queueCallback(queue) });

    const result = await inferOnce(client, queue, 4, 13);
    const vector = result.asVector("OUTPUT");
    expect(vector?.length).toBe(1);
    expect(vector?.get(0)).toBe(13);
    expect(result.modelName).toBe("simple_sequence");
  });

  it("lets the server shut down once the stream is finished", async () => {
    const queue = new CompletionQueue<StreamItem>();
    client.startStream({ callback: queueCallback(queue) });
    await inferOnce(client, queue, 6, 1);
    await client.stopStream();

    await expect(server.shutdown()).resolves.toBeUndefined();
  });

  it("allows one stream at a time", () => {
    client.startStream({ callback: () => {} });
    expect(() => client.startStream({ callback: () => {} })).toThrow(
      /^cannot start another stream with one already running/,
    );
  });

  it("requires a stream before sending", () => {
    expect(() => client.asyncStreamInfer({ modelName: "simple_sequence", inputs: [input(1)] })).toThrow(
      "stream not available, use startStream() to make one available.",
    );
  });

  it("reports an expired stream deadline through the callback", async () => {
    const queue = new CompletionQueue<StreamItem>();
    client.startStream({ callback: queueCallback(queue), streamTimeout: 0.2 });

    const item = await queue.get(5_000);
    expect(item).toBeInstanceOf(InferenceServerError);
    expect(item instanceof InferenceServerError ? item.status : null).toBe("StatusCode.DEADLINE_EXCEEDED");
  });

  it("does not report a stream it cancelled", async () => {
    const items: StreamItem[] = [];
    client.startStream({
      callback: (result, error) => {
        if (error) items.push(error);
        else if (result) items.push(result);
      },
    });
    await client.stopStream(true);
    expect(client.streaming).toBe(false);
    expect(items).toEqual([]);
  });

  it("can be closed twice", async () => {
    await client.close();
    await client.close();
    expect(() => client.startStream({ callback: () => {} })).toThrow("client is closed");
  });
});

describe("InferenceServerClient without a server", () => {
  it("reports the transport failure with its status", async () => {
    const client = new InferenceServerClient({ url: await unusedUrl(), onLog: () => {} });
    const queue = new CompletionQueue<StreamItem>();
    try {
      client.startStream({ callback: queueCallback(queue) });
      client.asyncStreamInfer({
        modelName: "simple_sequence",
        inputs: [input(1)],
        sequenceId: 1,
        sequenceStart: true,
      });

      const item = await queue.get(10_000);
      expect(item instanceof InferenceServerError ? item.status : null).toBe("StatusCode.UNAVAILABLE");
    } finally {
      await client.close();
    }
  });
});

describe("InferenceServerClient logging", () => {
  let server: SequenceInferenceServer;
  let url: string;

  beforeEach(async () => {
    ({ server, url } = await startServer());
  });

  afterEach(() => {
    server.forceShutdown();
  });

  async function runOnce(verbose: boolean): Promise<LogMessage[]> {
    const logs: LogMessage[] = [];
    const client = new InferenceServerClient({ url, verbose, onLog: (msg) => logs.push(msg) });
    const queue = new CompletionQueue<StreamItem>();
    try {
      client.startStream({ callback: queueCallback(queue) });
      await inferOnce(client, queue, 3, 5);
      await client.stopStream();
    } finally {
      await client.close();
    }
    return logs;
  }

  it("logs every request and response when verbose", async () => {
    const logs = await runOnce(true);
    const messages = logs.map((msg) => msg.message);
    expect(messages).toContain("async_stream_infer simple_sequence 3_1");
    expect(messages).toContain("stream response 3_1");
    expect(messages.indexOf("async_stream_infer simple_sequence 3_1")).toBeLessThan(
      messages.indexOf("stream response 3_1"),
    );
    expect(logs.every((msg) => msg.level === "debug")).toBe(true);
  });

  it("logs nothing otherwise", async () => {
    expect(await runOnce(false)).toEqual([]);
  });
});

describe("InferenceServerClient against a server that ends the stream early", () => {
  it("reports the results still outstanding", async () => {
    const early = new Server();
    early.addService(loadInferenceService(), {
      ModelStreamInfer: (call: ServerDuplexStream<object, object>) => {
        call.once("data", () => call.end());
      },
    });
    const port = await new Promise<number>((resolve, reject) => {
      early.bindAsync("127.0.0.1:0", ServerCredentials.createInsecure(), (err, bound) =>
        err ? reject(err) : resolve(bound),
      );
    });

    const client = new InferenceServerClient({ url: `127.0.0.1:${port}`, onLog: () => {} });
    const queue = new CompletionQueue<StreamItem>();
    try {
      client.startStream({ callback: queueCallback(queue) });
      for (const count of [1, 2]) {
        client.asyncStreamInfer({
          modelName: "simple_sequence",
          inputs: [input(count)],
          requestId: `8_${count}`,
          sequenceId: 8,
          sequenceStart: count === 1,
          sequenceEnd: count === 2,
        });
      }

      const item = await queue.get(5_000);
      expect(item).toBeInstanceOf(InferenceServerError);
      expect(item instanceof InferenceServerError ? item.message : null).toBe(
        "stream closed by the server with 2 results outstanding",
      );
      expect(client.streaming).toBe(false);
    } finally {
      await client.close();
      early.forceShutdown();
    }
  });
});
