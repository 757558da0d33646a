export type ErrorCode =
  // configuration (fatal at graph-build time)
  | "INVALID_CONFIG"
  | "UNSUPPORTED_EXECUTION_TYPE"
  | "DANGLING_ROLE_REFERENCE"
  | "DUPLICATE_ROLE"
  | "DUPLICATE_CAPABILITY"
  | "INVALID_ROUTING_RULE"
  | "INSTRUCTION_UNRESOLVED"
  | "UNKNOWN_BUILTIN_TOOL"
  | "UNKNOWN_TOOL_SERVER"
  | "SECRET_RESOLUTION_FAILED"
  | "TOOL_SERVER_UNAVAILABLE"
  | "CONFIG_NOT_FOUND"
  | "CONFIG_UNREACHABLE"
  // collaborators
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "UNREACHABLE"
  | "BAD_RESPONSE"
  // requests / documents
  | "PARSE_FAILED"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  // execution
  | "PROVIDER_ERROR"
  | "TOOL_EXECUTION_ERROR";

export class RuntimeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RuntimeError";
    this.code = code;
  }
}

/** Raised while turning a RuntimeConfig into a graph. Never raised at task time. */
export class ConfigError extends RuntimeError {
  /** Role the error is about, when there is one. */
  readonly role?: string;

  constructor(code: ErrorCode, message: string, options?: { role?: string; cause?: unknown }) {
    super(code, message, { cause: options?.cause });
    this.name = "ConfigError";
    this.role = options?.role;
  }
}

export class ParseError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}

export class ValidationError extends RuntimeError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** A collaborator (prompt, secret, config or tool store) failed or answered badly. */
export class StoreError extends RuntimeError {
  readonly store: string;

  constructor(
    store: string,
    code: Extract<ErrorCode, "NOT_FOUND" | "UNAUTHORIZED" | "UNREACHABLE" | "BAD_RESPONSE">,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = "StoreError";
    this.store = store;
  }
}

export class ProviderError extends RuntimeError {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, options?: { retryable?: boolean; status?: number; cause?: unknown }) {
    super("PROVIDER_ERROR", message, { cause: options?.cause });
    this.name = "ProviderError";
    this.retryable = options?.retryable ?? true;
    this.status = options?.status;
  }
}

export class ToolExecutionError extends RuntimeError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super("TOOL_EXECUTION_ERROR", message, options);
    this.name = "ToolExecutionError";
    this.tool = tool;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
