export type PipelineStage = "summarize" | "enhance" | "synthesize" | "assemble" | "publish";

export class ConfigurationError extends Error {
  readonly kind = "configuration";
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

/** The upstream refused our credentials or request signature. */
export class UpstreamAuthError extends Error {
  readonly kind = "upstream_auth";
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`upstream rejected credentials (status ${status}): ${body}`);
    this.name = "UpstreamAuthError";
    this.status = status;
    this.body = body;
  }
}

export class UpstreamProtocolError extends Error {
  readonly kind = "upstream_protocol";
  readonly status: number | null;
  readonly upstreamMessage: string;

  constructor(message: string, upstreamMessage: string, status: number | null = null) {
    super(message);
    this.name = "UpstreamProtocolError";
    this.status = status;
    this.upstreamMessage = upstreamMessage;
  }
}

export class ParseError extends Error {
  readonly kind = "parse";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ParseError";
    this.issues = issues;
  }
}

abstract class StageError extends Error {
  abstract readonly kind: string;
  readonly stage: PipelineStage;

  protected constructor(name: string, stage: PipelineStage, message: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : cause === undefined ? "" : `: ${String(cause)}`;
    super(`${message}${detail}`, cause === undefined ? undefined : { cause });
    this.name = name;
    this.stage = stage;
  }
}

export class SummarizationError extends StageError {
  readonly kind = "summarization";
  constructor(message: string, cause?: unknown) {
    super("SummarizationError", "summarize", message, cause);
  }
}

export class PromptEnhancementError extends StageError {
  readonly kind = "prompt_enhancement";
  constructor(message: string, cause?: unknown) {
    super("PromptEnhancementError", "enhance", message, cause);
  }
}

export class SynthesisError extends StageError {
  readonly kind = "synthesis";
  constructor(message: string, cause?: unknown) {
    super("SynthesisError", "synthesize", message, cause);
  }
}

export class AssemblyError extends StageError {
  readonly kind = "assembly";
  constructor(message: string, cause?: unknown) {
    super("AssemblyError", "assemble", message, cause);
  }
}

export class StorageWriteError extends StageError {
  readonly kind = "storage_write";
  constructor(message: string, cause?: unknown) {
    super("StorageWriteError", "publish", message, cause);
  }
}

/** Raised before any synthesis call when the story has no title or no bullets. */
export class InvalidStoryInputError extends StageError {
  readonly kind = "invalid_input";
  constructor(message: string) {
    super("InvalidStoryInputError", "summarize", message);
  }
}

export type PipelineError =
  | SummarizationError
  | PromptEnhancementError
  | SynthesisError
  | AssemblyError
  | StorageWriteError
  | InvalidStoryInputError;

export type ErrorDescription = {
  kind: string;
  stage?: PipelineStage;
  message: string;
  cause?: string;
};

export function isPipelineError(err: unknown): err is PipelineError {
  return (
    err instanceof SummarizationError ||
    err instanceof PromptEnhancementError ||
    err instanceof SynthesisError ||
    err instanceof AssemblyError ||
    err instanceof StorageWriteError ||
    err instanceof InvalidStoryInputError
  );
}

function causeKind(cause: unknown): string | undefined {
  if (
    cause instanceof UpstreamAuthError ||
    cause instanceof UpstreamProtocolError ||
    cause instanceof ParseError ||
    cause instanceof ConfigurationError
  ) {
    return cause.kind;
  }
  return cause instanceof Error ? cause.name : undefined;
}

export function describeError(err: unknown): ErrorDescription {
  if (isPipelineError(err)) {
    const cause = causeKind(err.cause);
    return cause ? { kind: err.kind, stage: err.stage, message: err.message, cause } : { kind: err.kind, stage: err.stage, message: err.message };
  }
  if (err instanceof ConfigurationError) return { kind: err.kind, message: err.message };
  return { kind: "unknown", message: err instanceof Error ? err.message : String(err) };
}

/**
 * Maps an HTTP-ish failure (anything carrying a numeric `status`) to the upstream taxonomy.
 * Errors without a status pass through untouched.
 */
export function classifyUpstreamFailure(err: unknown): unknown {
  if (!err || typeof err !== "object" || !("status" in err) || typeof err.status !== "number") return err;
  const message = err instanceof Error ? err.message : String(err);
  if (err.status === 401 || err.status === 403) return new UpstreamAuthError(err.status, message);
  return new UpstreamProtocolError(`upstream returned status ${err.status}`, message, err.status);
}
