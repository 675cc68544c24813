// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { Client, Metadata, credentials, type CallOptions } from "@grpc/grpc-js";
import { InferenceServerError } from "../errors.js";
import type { LogFn, LogLevel } from "../types.js";
import { streamInferMethod } from "../wire/proto.js";
import { encodeInferRequest } from "../wire/request.js";
import { InferStream } from "./stream.js";
import type {
  AsyncStreamInferOptions,
  InferenceServerClientOptions,
  StartStreamOptions,
} from "./types.js";

const defaultLog: LogFn = (msg) => {
  console.error(msg.message);
};

/**
 * gRPC client for a v2 inference server. Holds one channel and at most one
 * active `ModelStreamInfer` stream.
 */
export class InferenceServerClient {
  readonly url: string;
  private _channel: Client;
  private _stream: InferStream | null = null;
  private _verbose: boolean;
  private _onLog: LogFn;
  private _closed = false;

  constructor(options: InferenceServerClientOptions) {
    if (options.url.includes("://")) {
      throw new InferenceServerError(
        `url should not include the scheme, got '${options.url}'`,
      );
    }
    this.url = options.url;
    this._verbose = options.verbose ?? false;
    this._onLog = options.onLog ?? defaultLog;
    this._channel = new Client(options.url, credentials.createInsecure());
  }

  private _log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (level === "debug" && !this._verbose) return;
    this._onLog({ level, message, extra });
  }

  /** True while a stream is open and accepting requests. */
  get streaming(): boolean {
    return this._stream?.active ?? false;
  }

  /**
   * Open the bidirectional stream. Results and errors are delivered to
   * `callback` in the order the server sends them.
   */
  startStream(options: StartStreamOptions): void {
    if (this._closed) {
      throw new InferenceServerError("client is closed");
    }
    if (this._stream) {
      throw new InferenceServerError(
        "cannot start another stream with one already running. " +
          "InferenceServerClient supports only a single active stream at a given time.",
      );
    }

    const callOptions: CallOptions = {};
    if (options.streamTimeout != null) {
      callOptions.deadline = Date.now() + options.streamTimeout * 1000;
    }

    const method = streamInferMethod();
    const call = this._channel.makeBidiStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      new Metadata(),
      callOptions,
    );
    this._stream = new InferStream(call, options.callback, (level, message, extra) =>
      this._log(level, message, extra),
    );
    this._log("debug", `stream started on ${this.url}`, {
      streamTimeout: options.streamTimeout ?? null,
    });
  }

  /** Write one inference request on the active stream. */
  asyncStreamInfer(options: AsyncStreamInferOptions): void {
    if (!this._stream) {
      throw new InferenceServerError("stream not available, use startStream() to make one available.");
    }
    const request = encodeInferRequest({
      modelName: options.modelName,
      modelVersion: options.modelVersion,
      requestId: options.requestId,
      sequenceId: options.sequenceId,
      sequenceStart: options.sequenceStart,
      sequenceEnd: options.sequenceEnd,
      priority: options.priority,
      timeout: options.timeout,
      parameters: options.parameters,
      inputs: options.inputs.map((input) => input.toTensor()),
      outputs: options.outputs?.map((output) => ({ name: output.name })),
    });
    this._log("debug", `async_stream_infer ${request.model_name} ${request.id}`, {
      parameters: request.parameters,
    });
    this._stream.write(request);
  }

  /**
   * Close the active stream and wait until the server has finished it.
   * Pending requests are completed unless `cancelRequests` is set.
   */
  async stopStream(cancelRequests = false): Promise<void> {
    const stream = this._stream;
    if (!stream) return;
    this._stream = null;
    await stream.close(cancelRequests);
    this._log("debug", `stream stopped after ${stream.responseCount} responses`);
  }

  /** Stop any active stream and release the channel. Safe to call twice. */
  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    try {
      await this.stopStream();
    } finally {
      this._channel.close();
    }
  }
}

/**
 * Run `fn` with a connected client, closing it however `fn` exits.
 */
export async function withClient<T>(
  options: InferenceServerClientOptions,
  fn: (client: InferenceServerClient) => Promise<T>,
): Promise<T> {
  const client = new InferenceServerClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
