// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { status as Status, type ClientDuplexStream, type StatusObject } from "@grpc/grpc-js";
import { InferenceServerError } from "../errors.js";
import type { LogLevel } from "../types.js";
import type { ModelInferRequestInit } from "../wire/messages.js";
import { decodeStreamResponse } from "../wire/response.js";
import { InferResult } from "./infer.js";
import type { StreamCallback } from "./types.js";

type StreamLog = (level: LogLevel, message: string, extra?: Record<string, unknown>) => void;

/**
 * One open `ModelStreamInfer` call. Requests are written in caller order;
 * every response or transport error is handed to the callback.
 */
export class InferStream {
  private _call: ClientDuplexStream<object, object>;
  private _callback: StreamCallback;
  private _log: StreamLog;
  private _done: Promise<void>;
  private _closing = false;
  private _cancelled = false;
  private _finished = false;
  private _requests = 0;
  private _responses = 0;

  constructor(call: ClientDuplexStream<object, object>, callback: StreamCallback, log: StreamLog) {
    this._call = call;
    this._callback = callback;
    this._log = log;
    this._done = new Promise<void>((resolve) => {
      call.on("status", (status: StatusObject) => {
        this._finished = true;
        this._onStatus(status);
        resolve();
      });
    });
    call.on("data", (message: object) => this._onResponse(message));
    call.on("error", (err: Error) => this._onError(err));
  }

  /** True while requests may still be written. */
  get active(): boolean {
    return !this._closing && !this._finished;
  }

  /** Responses received so far, errors included. */
  get responseCount(): number {
    return this._responses;
  }

  write(request: ModelInferRequestInit): void {
    if (this._closing) {
      throw new InferenceServerError("stream is closed; start a new stream to send more requests");
    }
    if (this._finished) {
      throw new InferenceServerError(
        "The stream is no longer in valid state, the error detail is reported through provided callback. " +
          "A new stream should be started after stopping the current stream.",
      );
    }
    this._requests++;
    this._call.write(request);
  }

  /**
   * Half-close the stream and wait for the server to finish it. With
   * `cancelRequests`, cancel the call instead; the resulting CANCELLED
   * status is not reported to the callback.
   */
  async close(cancelRequests = false): Promise<void> {
    if (!this._closing && !this._finished) {
      this._closing = true;
      if (cancelRequests) {
        this._cancelled = true;
        this._call.cancel();
      } else {
        this._call.end();
      }
    }
    this._closing = true;
    await this._done;
  }

  private _onResponse(message: object): void {
    this._responses++;
    let result: InferResult;
    try {
      result = new InferResult(decodeStreamResponse(message));
    } catch (e) {
      const error = InferenceServerError.from(e);
      this._log("debug", `stream error response: ${error.message}`);
      this._callback(null, error);
      return;
    }
    this._log("debug", `stream response ${result.id}`, { model: result.modelName });
    this._callback(result, null);
  }

  /** An OK status we did not ask for: the server ended the stream on its own. */
  private _onStatus(status: StatusObject): void {
    if (status.code !== Status.OK || this._closing) return;
    const outstanding = Math.max(0, this._requests - this._responses);
    this._log("debug", `stream closed by the server after ${this._responses} responses`);
    this._callback(
      null,
      new InferenceServerError(`stream closed by the server with ${outstanding} results outstanding`),
    );
  }

  private _onError(err: Error): void {
    const error = InferenceServerError.from(err);
    if (this._cancelled && error.status === "StatusCode.CANCELLED") {
      this._log("debug", "stream cancelled");
      return;
    }
    this._responses++;
    this._callback(null, error);
  }
}
