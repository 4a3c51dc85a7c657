export type ToolOrigin = "portable" | "path";

export type InvocationStrategy = "direct" | "windows-cmd" | "windows-powershell";

export type ToolCandidate = {
  origin: ToolOrigin;
  /** Binary handed to the OS: the portable runtime, or the PATH match. */
  executablePath: string;
  /** Script run by the runtime when the candidate is a runtime+script pair. */
  entrypointPath?: string;
  invocationStrategy: InvocationStrategy;
  /** Directories prepended to PATH for the child (portable installs only). */
  binDirs?: string[];
};

export type EnvironmentSpec = Record<string, string>;

export type AssistantOperation = "login" | "status" | "exec" | "install";

export type CommandSpec = {
  operation: AssistantOperation;
  argv: string[];
};

export type SandboxMode = "read-only" | "workspace-write" | "danger-full-access";

export type ApprovalPolicy = "untrusted" | "on-failure" | "on-request" | "never";

export type RawLineStream = "stdout" | "stderr";

export type RawLine = {
  stream: RawLineStream;
  text: string;
  seq: number;
};

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

export type ProtocolMessage =
  | { type: "user_message"; text: string }
  | { type: "assistant_message"; buffer: string; open: boolean }
  | { type: "action"; label: string; payload?: string }
  | { type: "error"; message: string; transportStatus?: number };

export type DisplayEvent =
  | { index: number; type: "user_message"; text: string }
  | { index: number; type: "assistant_message"; text: string }
  | { index: number; type: "action"; label: string; payload?: string; text: string }
  | { index: number; type: "error"; message: string; transportStatus?: number }
  | { index: number; type: "notice"; text: string };

export type DisplayEventType = DisplayEvent["type"];

export type DiagnosticKind =
  | "unauthenticated"
  | "forbidden"
  | "proxy_auth_required"
  | "rate_limited"
  | "server_error"
  | "transport_error"
  | "process_failure";

export type Diagnostic = {
  kind: DiagnosticKind;
  exitCode: number | null;
  status?: number;
  summary: string;
  guidance: string;
};
