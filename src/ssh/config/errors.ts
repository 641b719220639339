export enum SshConfigErrorCode {
  IO = "IO",
  UNPARSEABLE_LINE = "UNPARSEABLE_LINE",
  UNKNOWN_ENTRY = "UNKNOWN_ENTRY",
  INVALID_INCLUDE = "INVALID_INCLUDE",
}

/** Where in which file a line came from. `line` is 1-based. */
export type SourceLocation = {
  file: string;
  line: number;
};

function where(location: SourceLocation) {
  return `${location.file}:${location.line}`;
}

export class SshConfigError extends Error {
  readonly code: SshConfigErrorCode;

  constructor(message: string, code: SshConfigErrorCode, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = "SshConfigError";
    this.code = code;
  }
}

export class ConfigIoError extends SshConfigError {
  readonly path: string;
  /** errno code reported by node:fs, e.g. ENOENT. */
  readonly errno?: string;

  constructor(path: string, cause: Error) {
    super(`Cannot read ${path}: ${cause.message}`, SshConfigErrorCode.IO, cause);
    this.name = "ConfigIoError";
    this.path = path;
    this.errno = errnoOf(cause);
  }
}

export class UnparseableLineError extends SshConfigError {
  readonly line: string;
  readonly location?: SourceLocation;

  constructor(line: string, location?: SourceLocation) {
    super(
      location ? `Invalid line at ${where(location)}: ${line}` : `Invalid line: ${line}`,
      SshConfigErrorCode.UNPARSEABLE_LINE
    );
    this.name = "UnparseableLineError";
    this.line = line;
    this.location = location;
  }
}

export class UnknownEntryError extends SshConfigError {
  readonly entry: string;
  readonly line: string;
  readonly location: SourceLocation;

  constructor(entry: string, line: string, location: SourceLocation) {
    super(`Unknown entry "${entry}" at ${where(location)}: ${line}`, SshConfigErrorCode.UNKNOWN_ENTRY);
    this.name = "UnknownEntryError";
    this.entry = entry;
    this.line = line;
    this.location = location;
  }
}

export type InvalidIncludeReason = "pattern" | "glob" | "hosts-inside-host-block" | "cycle";

const REASON_TEXT: Record<InvalidIncludeReason, string> = {
  pattern: "invalid include pattern",
  glob: "include pattern could not be expanded",
  "hosts-inside-host-block": "cannot include hosts inside a host block",
  cycle: "include cycle detected",
};

export class InvalidIncludeError extends SshConfigError {
  readonly line: string;
  readonly reason: InvalidIncludeReason;
  readonly location: SourceLocation;

  constructor(line: string, reason: InvalidIncludeReason, location: SourceLocation, cause?: Error) {
    super(
      `${REASON_TEXT[reason]} at ${where(location)}: ${line}`,
      SshConfigErrorCode.INVALID_INCLUDE,
      cause
    );
    this.name = "InvalidIncludeError";
    this.line = line;
    this.reason = reason;
    this.location = location;
  }
}

export function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
