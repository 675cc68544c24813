// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { Server, ServerCredentials, type ServerDuplexStream } from "@grpc/grpc-js";
import { STREAM_INFER_METHOD } from "./constants.js";
import { dispatchSequence, SequenceStates } from "./dispatch/sequence.js";
import { InferenceServerError } from "./errors.js";
import { ModelRepository } from "./repository.js";
import type { LogFn, LogLevel } from "./types.js";
import type { ModelStreamInferResponseInit } from "./wire/messages.js";
import { loadInferenceService } from "./wire/proto.js";
import { decodeInferRequest, type InferRequestView } from "./wire/request.js";
import { encodeStreamError } from "./wire/response.js";

/** Return an error message to reject a request before it reaches its model. */
export type FaultInjector = (request: InferRequestView) => string | null | undefined;

export interface SequenceServerOptions {
  repository?: ModelRepository;
  onLog?: LogFn;
  failOn?: FaultInjector;
}

/**
 * gRPC server speaking `ModelStreamInfer` for a repository of sequence
 * models. Requests on one stream are answered in order; failures are
 * reported in-band and leave the stream open.
 */
export class SequenceInferenceServer {
  private _server: Server;
  private _repository: ModelRepository;
  private _states = new SequenceStates();
  private _onLog?: LogFn;
  private _failOn?: FaultInjector;

  constructor(options: SequenceServerOptions = {}) {
    this._repository = options.repository ?? ModelRepository.withSequenceModels();
    this._onLog = options.onLog;
    this._failOn = options.failOn;
    this._server = new Server();
    this._server.addService(loadInferenceService(), {
      [STREAM_INFER_METHOD]: (call: ServerDuplexStream<object, object>) => this._serveStream(call),
    });
  }

  /** Sequences started and not yet ended, across all models. */
  get openSequences(): number {
    return this._states.size;
  }

  /** Replace (or clear) the fault injector. */
  failOn(injector: FaultInjector | null): void {
    this._failOn = injector ?? undefined;
  }

  /** Bind and start serving. Resolves with the bound port. */
  listen(address = "127.0.0.1:0"): Promise<number> {
    return new Promise((resolve, reject) => {
      this._server.bindAsync(address, ServerCredentials.createInsecure(), (err, port) => {
        if (err) {
          reject(err);
          return;
        }
        this._log("info", `serving ${[...this._repository.getModels().keys()].join(", ")} on port ${port}`);
        resolve(port);
      });
    });
  }

  /** Stop accepting calls and wait for open streams to finish. */
  shutdown(): Promise<void> {
    return new Promise((resolve, reject) => {
      this._server.tryShutdown((err) => (err ? reject(err) : resolve()));
    });
  }

  /** Stop immediately, cancelling open streams. */
  forceShutdown(): void {
    this._server.forceShutdown();
  }

  /** Answer one deserialized `ModelInferRequest`. */
  handle(message: unknown): ModelStreamInferResponseInit {
    try {
      const request = decodeInferRequest(message);
      const fault = this._failOn?.(request);
      if (fault) {
        this._log("warn", `injected failure for request '${request.id}': ${fault}`);
        return encodeStreamError(fault);
      }
      const model = this._repository.get(request.modelName);
      if (!model) {
        throw new InferenceServerError(`Request for unknown model: '${request.modelName}' is not found`);
      }
      this._log("debug", `infer ${model.name} ${request.id}`, {
        sequenceId: request.sequenceId,
        start: request.sequenceStart,
        end: request.sequenceEnd,
      });
      return dispatchSequence(model, request, this._states);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this._log("warn", message);
      return encodeStreamError(message);
    }
  }

  private _serveStream(call: ServerDuplexStream<object, object>): void {
    call.on("data", (message: unknown) => {
      call.write(this.handle(message));
    });
    call.on("end", () => call.end());
    call.on("error", (err: Error) => {
      this._log("warn", `stream error: ${err.message}`);
    });
  }

  private _log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    this._onLog?.({ level, message, extra });
  }
}
