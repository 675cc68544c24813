import { status as Status } from "@grpc/grpc-js";

/** Error reported by the inference server or by the gRPC transport under it. */
export class InferenceServerError extends Error {
  constructor(
    public readonly errorMessage: string,
    public readonly status: string | null = null,
    public readonly debugDetails: string | null = null,
  ) {
    super(status ? `[${status}] ${errorMessage}` : errorMessage);
    this.name = "InferenceServerError";
  }

  /** Wrap anything a gRPC call rejected or emitted with. */
  static from(err: unknown): InferenceServerError {
    if (err instanceof InferenceServerError) return err;
    if (isServiceError(err)) {
      const name = Status[err.code] ?? String(err.code);
      return new InferenceServerError(
        err.details || err.message,
        `StatusCode.${name}`,
        err.message,
      );
    }
    return new InferenceServerError(err instanceof Error ? err.message : String(err));
  }
}

/** A result that cannot be matched to any sequence that was sent. */
export class SequenceProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequenceProtocolError";
  }
}

/** A received output that differs from the locally computed accumulation. */
export class SequenceMismatchError extends Error {
  constructor(
    public readonly step: number,
    public readonly expected: readonly number[],
    public readonly actual: readonly number[],
  ) {
    super(
      `Sequence mismatch at step ${step}: expected ${expected.join(" : ")}, got ${actual.join(" : ")}`,
    );
    this.name = "SequenceMismatchError";
  }
}

/** Raised when no item arrives on a completion queue within the wait limit. */
export class QueueTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`No result received within ${timeoutMs}ms`);
    this.name = "QueueTimeoutError";
  }
}

/** Invalid command-line flags or run options. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

interface ServiceErrorLike {
  code: number;
  details: string;
  message: string;
}

function isServiceError(err: unknown): err is ServiceErrorLike {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "number" &&
    "details" in err &&
    typeof err.details === "string"
  );
}
