// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { buildSequencePlan } from "../sequence/plan.js";
import { runSequenceCheck } from "../sequence/runner.js";
import { parseCliArgs, USAGE, type ParsedArgs } from "./config.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Run the sequence check from command-line flags. Resolves with the exit code. */
export async function main(
  argv: readonly string[],
  io: CliIo = consoleIo,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv, env);
  } catch (e) {
    io.err(errorText(e));
    io.err(USAGE);
    return 1;
  }
  if (parsed.help) {
    io.out(USAGE);
    return 0;
  }

  const { config } = parsed;
  try {
    const plan = buildSequencePlan({
      dyna: config.dyna,
      offset: config.offset,
      modelName: config.modelName,
    });
    await runSequenceCheck({
      url: config.url,
      plan,
      verbose: config.verbose,
      streamTimeout: config.streamTimeout,
      print: (line) => io.out(line),
      onLog: (msg) => io.err(msg.message),
    });
  } catch (e) {
    io.err(errorText(e));
    return 1;
  }

  io.out("PASS: Sequence");
  return 0;
}
