/**
 * Structured errors raised by the assistant bridge.
 *
 * Every error carries a machine-readable `code` and a one-sentence
 * `guidance` string the caller can show as-is.
 */

export type AssistantErrorCategory =
  | "resolution"
  | "environment"
  | "argv"
  | "spawn"
  | "exit"
  | "protocol"
  | "auth";

export type AssistantErrorCode =
  | "tool_not_found"
  | "runtime_not_found"
  | "npm_not_found"
  | "environment_unavailable"
  | "empty_prompt"
  | "empty_argv"
  | "empty_package"
  | "invocation_in_progress"
  | "spawn_failed"
  | "process_exit"
  | "malformed_line"
  | "not_authenticated";

const CATEGORY_BY_CODE: Record<AssistantErrorCode, AssistantErrorCategory> = {
  tool_not_found: "resolution",
  runtime_not_found: "resolution",
  npm_not_found: "resolution",
  environment_unavailable: "environment",
  empty_prompt: "argv",
  empty_argv: "argv",
  empty_package: "argv",
  invocation_in_progress: "argv",
  spawn_failed: "spawn",
  process_exit: "exit",
  malformed_line: "protocol",
  not_authenticated: "auth",
};

export class AssistantBridgeError extends Error {
  readonly code: AssistantErrorCode;
  readonly category: AssistantErrorCategory;
  readonly guidance: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AssistantErrorCode,
    message: string,
    opts: { guidance: string; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "AssistantBridgeError";
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
    this.guidance = opts.guidance;
    if (opts.details) {
      this.details = opts.details;
    }
  }
}

export function resolutionError(
  code: "tool_not_found" | "runtime_not_found" | "npm_not_found",
  message: string,
  guidance: string,
  details?: Record<string, unknown>
): AssistantBridgeError {
  return new AssistantBridgeError(code, message, { guidance, details });
}

export function argvError(
  code: "empty_prompt" | "empty_argv" | "empty_package" | "invocation_in_progress"
): AssistantBridgeError {
  switch (code) {
    case "empty_prompt":
      return new AssistantBridgeError(code, "Prompt must not be empty", {
        guidance: "Type a request for the assistant before sending.",
      });
    case "empty_argv":
      return new AssistantBridgeError(code, "Argument vector must not be empty", {
        guidance: "Build the command with the command builder before running it.",
      });
    case "empty_package":
      return new AssistantBridgeError(code, "Package name must not be empty", {
        guidance: "Set USBIDE_CODEX_NPM_PACKAGE to a package name or unset it to use the default.",
      });
    case "invocation_in_progress":
      return new AssistantBridgeError(code, "Another assistant invocation is still running", {
        guidance: "Wait for the current request to finish or cancel it first.",
      });
  }
}

export function spawnError(command: string, cause: unknown): AssistantBridgeError {
  const reason = asError(cause).message;
  return new AssistantBridgeError("spawn_failed", `Failed to start ${command}: ${reason}`, {
    guidance: "Check that the executable exists and is allowed to run on this machine.",
    details: { command },
    cause,
  });
}

export function environmentError(cause: unknown): AssistantBridgeError {
  return new AssistantBridgeError(
    "environment_unavailable",
    `Unable to read the process environment: ${asError(cause).message}`,
    {
      guidance: "Restart the environment from a regular shell session.",
      cause,
    }
  );
}

export function authError(exitCode: number | null): AssistantBridgeError {
  return new AssistantBridgeError(
    "not_authenticated",
    `Assistant login status check failed (exit ${exitCode ?? "unknown"})`,
    {
      guidance:
        "Run the login command, then send the request again (set USBIDE_CODEX_DEVICE_AUTH=1 if no browser opens).",
      details: { exitCode },
    }
  );
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  return new Error(String(e));
}

export function isAssistantBridgeError(e: unknown): e is AssistantBridgeError {
  return e instanceof AssistantBridgeError;
}

/**
 * Plain object for structured loggers. Never includes environment values.
 */
export function errorLogFields(e: unknown): Record<string, unknown> {
  const err = asError(e);
  const fields: Record<string, unknown> = { message: err.message };
  if (isAssistantBridgeError(err)) {
    fields.code = err.code;
    fields.category = err.category;
    if (err.details) fields.details = err.details;
  }
  if (err.cause !== undefined) {
    fields.cause_message = asError(err.cause).message;
  }
  if (err.stack) fields.stack = err.stack;
  return fields;
}
