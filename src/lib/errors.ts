export type SemanticErrorCode =
  | "config-unreadable"
  | "config-malformed"
  | "unknown-command"
  | "malformed-mapping"
  | "execution-failed"
  | "commit-failed";

const SETUP_HINT = "Run `semantic` (no args) to set up your config first.";

export abstract class SemanticError extends Error {
  abstract readonly code: SemanticErrorCode;
  readonly hint?: string;

  constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.hint = options.hint;
  }
}

export class ConfigUnreadableError extends SemanticError {
  readonly code = "config-unreadable";
  readonly configPath: string;

  constructor(configPath: string, reason: string, cause?: unknown) {
    super(`${configPath}: ${reason}`, { hint: SETUP_HINT, cause });
    this.configPath = configPath;
  }
}

export class ConfigMalformedError extends SemanticError {
  readonly code = "config-malformed";
  readonly configPath?: string;

  constructor(reason: string, configPath?: string, cause?: unknown) {
    super(configPath ? `${configPath}: ${reason}` : reason, { hint: SETUP_HINT, cause });
    this.configPath = configPath;
  }
}

export class UnknownCommandError extends SemanticError {
  readonly code = "unknown-command";
  readonly token: string;

  constructor(token: string) {
    super(`Unknown semantic command: ${token}`);
    this.token = token;
  }
}

export class MalformedMappingError extends SemanticError {
  readonly code = "malformed-mapping";
  readonly token: string;

  constructor(token: string) {
    super(`Mapping for '${token}' resolves to an empty command`, {
      hint: "Fix the [commands] entry by hand or rerun `semantic` to regenerate the config.",
    });
    this.token = token;
  }
}

export class ExecutionFailedError extends SemanticError {
  readonly code = "execution-failed";
  readonly commandLine: string;

  constructor(commandLine: string, cause: unknown) {
    super(`Failed to run \`${commandLine}\`: ${messageOf(cause)}`, { cause });
    this.commandLine = commandLine;
  }
}

export class CommitFailedError extends SemanticError {
  readonly code = "commit-failed";

  constructor(cause: unknown) {
    super(`Failed to write config: ${messageOf(cause)}`, { cause });
  }
}

export function isSemanticError(error: unknown): error is SemanticError {
  return error instanceof SemanticError;
}

export function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

/**
 * Diagnostic lines for a failure, heading first. `heading` prefixes the
 * error message (e.g. "Failed to load config").
 */
export function describeError(error: unknown, heading?: string): string[] {
  const message = messageOf(error);
  const lines = [heading ? `${heading}: ${message}` : message];
  if (isSemanticError(error) && error.hint) {
    lines.push(error.hint);
  }
  return lines;
}

