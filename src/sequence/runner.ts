// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { withClient } from "../client/grpc.js";
import { CompletionQueue } from "../client/queue.js";
import type { LogFn } from "../types.js";
import { collectResults, type StreamItem } from "./collector.js";
import type { SequencePlan } from "./plan.js";
import { asyncStreamSend } from "./sender.js";
import { validateSequences, type ValidationReport } from "./validator.js";

export type RunPhase = "open" | "sending" | "draining" | "validating" | "closed";

export interface SequenceCheckOptions {
  url: string;
  plan: SequencePlan;
  verbose?: boolean;
  /** Stream deadline in seconds. */
  streamTimeout?: number | null;
  /** Per-result wait limit while draining, in milliseconds. */
  resultTimeoutMs?: number;
  /** Diagnostic lines (per request sent, per step compared). */
  print?: (line: string) => void;
  onLog?: LogFn;
  onPhase?: (phase: RunPhase) => void;
}

/**
 * Send every sequence of the plan over one stream, collect all results and
 * validate them. The client is closed however the run ends; the first error
 * is thrown.
 */
export async function runSequenceCheck(options: SequenceCheckOptions): Promise<ValidationReport> {
  const { plan, print } = options;
  const phase = options.onPhase ?? (() => {});
  const queue = new CompletionQueue<StreamItem>();

  try {
    return await withClient(
      { url: options.url, verbose: options.verbose, onLog: options.onLog },
      async (client) => {
        client.startStream({
          callback: (result, error) => {
            if (error) queue.put(error);
            else if (result) queue.put(result);
          },
          streamTimeout: options.streamTimeout,
        });
        phase("open");

        phase("sending");
        for (const sequence of plan.sequences) {
          asyncStreamSend(client, sequence, {
            batchSize: plan.batchSize,
            modelVersion: plan.modelVersion,
            print,
          });
        }

        phase("draining");
        const received = await collectResults(queue, plan, {
          itemTimeoutMs: options.resultTimeoutMs,
        });

        phase("validating");
        return validateSequences(plan, received, { print });
      },
    );
  } finally {
    phase("closed");
  }
}
