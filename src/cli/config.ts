// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_URL, URL_ENV_VAR } from "../constants.js";
import { ConfigError } from "../errors.js";

export const CliConfigSchema = z.object({
  verbose: z.boolean().default(false),
  url: z
    .string()
    .min(1, "url must not be empty")
    .refine((url) => !url.includes("://"), "url must be host:port, without a scheme")
    .default(DEFAULT_URL),
  streamTimeout: z.coerce.number().positive("stream timeout must be positive").nullish(),
  dyna: z.boolean().default(false),
  offset: z.coerce.number().int("offset must be an integer").default(0),
  modelName: z.string().min(1, "model name must not be empty").nullish(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export type ParsedArgs = { help: true } | { help: false; config: CliConfig };

export const USAGE = `Usage: sequence-stream-check [options]

Send three sequences over one inference stream and check the accumulated outputs.

Options:
  -v, --verbose               Enable verbose output
  -u, --url <host:port>       Inference server URL and its gRPC port (default: ${DEFAULT_URL},
                              or $${URL_ENV_VAR})
  -t, --stream-timeout <sec>  Stream timeout in seconds (default: none)
  -d, --dyna                  Assume dynamic sequence models
  -o, --offset <n>            Add offset to the sequence IDs used (default: 0)
  -m, --model_name <name>     Model to send all sequences to
  -h, --help                  Show this help`;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

const NEGATIVE_NUMBER = /^-\d/;

/** `-o -2` would read `-2` as a flag; bind a negative offset to its option. */
function joinNegativeOffset(argv: readonly string[]): string[] {
  const args: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === "-o" || arg === "--offset") && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      args.push(`--offset=${next}`);
      i++;
    } else {
      args.push(arg);
    }
  }
  return args;
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: joinNegativeOffset(argv),
      strict: true,
      allowPositionals: false,
      options: {
        verbose: { type: "boolean", short: "v" },
        url: { type: "string", short: "u" },
        "stream-timeout": { type: "string", short: "t" },
        dyna: { type: "boolean", short: "d" },
        offset: { type: "string", short: "o" },
        model_name: { type: "string", short: "m" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
}

/** Parse and validate command-line flags. Bad flags raise `ConfigError`. */
export function parseCliArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env,
): ParsedArgs {
  const values = readFlags(argv);
  if (values.help) return { help: true };

  const parsed = CliConfigSchema.safeParse({
    verbose: values.verbose,
    url: values.url ?? env[URL_ENV_VAR],
    streamTimeout: values["stream-timeout"],
    dyna: values.dyna,
    offset: values.offset,
    modelName: values.model_name,
  });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return { help: false, config: parsed.data };
}
