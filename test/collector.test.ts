// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect } from "vitest";
import { CompletionQueue } from "../src/client/queue.js";
import { InferenceServerError, QueueTimeoutError, SequenceProtocolError } from "../src/errors.js";
import { collectResults, scalarOutput, sequenceKeyOf, type StreamItem } from "../src/sequence/collector.js";
import { buildSequencePlan } from "../src/sequence/plan.js";
import { int32Result } from "./support/helpers.js";

const plan = buildSequencePlan({
  values: [5],
  uuid: () => "a1b2-c3",
});

describe("sequenceKeyOf", () => {
  it("cuts the request ID at the first separator", () => {
    expect(sequenceKeyOf("1000_3")).toBe("1000");
    expect(sequenceKeyOf("a1b2-c3_12")).toBe("a1b2-c3");
    expect(sequenceKeyOf("plain")).toBe("plain");
  });
});

describe("scalarOutput", () => {
  it("takes the first OUTPUT element", () => {
    expect(scalarOutput(int32Result("1000_1", [42, 43]))).toBe(42);
  });

  it("rejects a result with no OUTPUT data", () => {
    expect(() => scalarOutput(int32Result("1000_1", []))).toThrow(SequenceProtocolError);
  });
});

describe("collectResults", () => {
  it("routes interleaved results to their sequences in arrival order", async () => {
    const queue = new CompletionQueue<StreamItem>();
    queue.put(int32Result("1001_1", [100]));
    queue.put(int32Result("1000_1", [0]));
    queue.put(int32Result("a1b2-c3_1", [20]));
    queue.put(int32Result("1000_2", [5]));
    queue.put(int32Result("1001_2", [95]));
    queue.put(int32Result("a1b2-c3_2", [15]));

    const outputs = await collectResults(queue, plan);
    expect(outputs.get("seq0")).toEqual([0, 5]);
    expect(outputs.get("seq1")).toEqual([100, 95]);
    expect(outputs.get("seq2")).toEqual([20, 15]);
    expect(queue.size).toBe(0);
  });

  it("throws the first error item", async () => {
    const queue = new CompletionQueue<StreamItem>();
    const error = new InferenceServerError("injected failure");
    queue.put(int32Result("1000_1", [0]));
    queue.put(error);

    await expect(collectResults(queue, plan)).rejects.toBe(error);
  });

  it("rejects a result for a sequence that was never sent", async () => {
    const queue = new CompletionQueue<StreamItem>();
    queue.put(int32Result("999_1", [0]));

    await expect(collectResults(queue, plan)).rejects.toThrow(
      new SequenceProtocolError(
        "unexpected sequence id returned by the server: 999 (model 'simple_sequence')",
      ),
    );
  });

  it("tells apart sequences whose IDs read the same on different models", async () => {
    const dynaPlan = buildSequencePlan({ dyna: true, offset: 1, values: [5] });
    expect(dynaPlan.sequences.map((s) => s.id)).toEqual([1002, 1003, "1003"]);

    const queue = new CompletionQueue<StreamItem>();
    queue.put(int32Result("1003_1", [20], "simple_string_dyna_sequence"));
    queue.put(int32Result("1003_1", [100], "simple_dyna_sequence"));
    queue.put(int32Result("1002_1", [0], "simple_dyna_sequence"));
    queue.put(int32Result("1002_2", [1007], "simple_dyna_sequence"));
    queue.put(int32Result("1003_2", [1098], "simple_dyna_sequence"));
    queue.put(int32Result("1003_2", [1018], "simple_string_dyna_sequence"));

    const outputs = await collectResults(queue, dynaPlan);
    expect(outputs.get("seq0")).toEqual([0, 1007]);
    expect(outputs.get("seq1")).toEqual([100, 1098]);
    expect(outputs.get("seq2")).toEqual([20, 1018]);
  });

  it("rejects a result whose model does not match the sequence", async () => {
    const queue = new CompletionQueue<StreamItem>();
    queue.put(int32Result("1000_1", [0], "other_model"));

    await expect(collectResults(queue, plan)).rejects.toThrow(
      "unexpected sequence id returned by the server: 1000 (model 'other_model')",
    );
  });

  it("stops after the expected count", async () => {
    const queue = new CompletionQueue<StreamItem>();
    queue.put(int32Result("1000_1", [0]));
    queue.put(int32Result("1000_2", [5]));

    const outputs = await collectResults(queue, plan, { expected: 1 });
    expect(outputs.get("seq0")).toEqual([0]);
    expect(queue.size).toBe(1);
  });

  it("gives up when a result does not arrive in time", async () => {
    const queue = new CompletionQueue<StreamItem>();
    await expect(collectResults(queue, plan, { itemTimeoutMs: 10 })).rejects.toThrow(QueueTimeoutError);
  });
});
