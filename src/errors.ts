export type DetectionErrorCode =
  | "source_fetch_failed"
  | "resolution_failed"
  | "query_failed"
  | "process_launch_failed"
  | "switch_timeout"
  | "unreachable"
  | "process_crash"
  | "run_cancelled";

/**
 * Base class for everything the pipeline reports per node or per run.
 *
 * `fatal` errors end the precise session; the rest only degrade a single node.
 * Messages read `code:detail`, the same shape the control-API helpers throw.
 */
export class DetectionError extends Error {
  readonly code: DetectionErrorCode;

  readonly fatal: boolean;

  constructor(code: DetectionErrorCode, detail: string, fatal: boolean, options?: { cause?: unknown }) {
    super(detail ? `${code}:${detail}` : code, options);
    this.name = new.target.name;
    this.code = code;
    this.fatal = fatal;
  }
}

export class SourceFetchError extends DetectionError {
  readonly source: string;

  constructor(source: string, detail: string, options?: { cause?: unknown }) {
    super("source_fetch_failed", detail, false, options);
    this.source = source;
  }
}

export class ResolutionError extends DetectionError {
  readonly host: string;

  constructor(host: string, detail: string, options?: { cause?: unknown }) {
    super("resolution_failed", `${host}:${detail}`, false, options);
    this.host = host;
  }
}

export class QueryError extends DetectionError {
  readonly ip: string;

  constructor(ip: string, detail: string, options?: { cause?: unknown }) {
    super("query_failed", `${ip}:${detail}`, false, options);
    this.ip = ip;
  }
}

export class SwitchTimeoutError extends DetectionError {
  constructor(outbound: string, detail: string) {
    super("switch_timeout", `${outbound}:${detail}`, false);
  }
}

export class UnreachableError extends DetectionError {
  constructor(outbound: string, detail: string, options?: { cause?: unknown }) {
    super("unreachable", `${outbound}:${detail}`, false, options);
  }
}

export class ProcessLaunchError extends DetectionError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("process_launch_failed", detail, true, options);
  }
}

export class ProcessCrashError extends DetectionError {
  readonly exitCode: number | null;

  constructor(exitCode: number | null, detail: string) {
    super("process_crash", detail, true);
    this.exitCode = exitCode;
  }
}

export class RunCancelledError extends DetectionError {
  constructor(detail: string) {
    super("run_cancelled", detail, true);
  }
}

export type SessionFatalError = ProcessLaunchError | ProcessCrashError | RunCancelledError;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
