import type { Diagnostic, DiagnosticKind } from "./assistant-types.js";

const EXPLICIT_STATUS = /(?:unexpected status|last status[: ]+|status code[: ]+|http )\s*(\d{3})\b/i;
const ANY_STATUS = /\b([1-5]\d{2})\b/;

/**
 * Pull an HTTP status out of an assistant error message. Explicit phrasing
 * ("unexpected status 401") wins over a bare three-digit number.
 */
export function extractStatusCode(message: string | null | undefined): number | undefined {
  if (!message) return undefined;
  const explicit = EXPLICIT_STATUS.exec(message);
  const match = explicit ?? ANY_STATUS.exec(message);
  if (!match?.[1]) return undefined;
  const status = Number.parseInt(match[1], 10);
  return status >= 100 && status <= 599 ? status : undefined;
}

type DiagnosticCopy = { summary: string; guidance: string };

const COPY: Record<DiagnosticKind, DiagnosticCopy> = {
  unauthenticated: {
    summary: "The assistant rejected the stored credentials (HTTP 401).",
    guidance: "Run the login command again, or log out and log back in with your ChatGPT account.",
  },
  forbidden: {
    summary: "The assistant refused the request (HTTP 403).",
    guidance: "Check that you logged in with ChatGPT rather than an API key, and that this network allows the assistant.",
  },
  proxy_auth_required: {
    summary: "A proxy between you and the assistant requires authentication (HTTP 407).",
    guidance: "Set HTTP_PROXY and HTTPS_PROXY with proxy credentials before launching.",
  },
  rate_limited: {
    summary: "The assistant is rate limiting this account (HTTP 429).",
    guidance: "Wait a few minutes before sending another request.",
  },
  server_error: {
    summary: "The assistant service returned a server error.",
    guidance: "Retry later; the service may be having an incident.",
  },
  transport_error: {
    summary: "The assistant reported a transport error.",
    guidance: "Check the network connection and send the request again.",
  },
  process_failure: {
    summary: "The assistant process exited with an error.",
    guidance: "Run the status command to check the installation and login, then try again.",
  },
};

export function kindForStatus(status: number): DiagnosticKind {
  if (status === 401) return "unauthenticated";
  if (status === 403) return "forbidden";
  if (status === 407) return "proxy_auth_required";
  if (status === 429) return "rate_limited";
  if (status >= 500 && status <= 599) return "server_error";
  return "transport_error";
}

/**
 * Label a finished invocation. A zero exit is never a failure, whatever the
 * stream reported. Only labels and advises; it never retries.
 */
export function classify(
  exitCode: number | null,
  lastErrorMessage?: string | null,
  transportStatus?: number
): Diagnostic | null {
  if (exitCode === 0) {
    return null;
  }
  const status = transportStatus ?? extractStatusCode(lastErrorMessage);
  if (status !== undefined) {
    const kind = kindForStatus(status);
    const copy = COPY[kind];
    const summary = kind === "server_error" || kind === "transport_error"
      ? `${copy.summary.replace(/\.$/, "")} (HTTP ${status}).`
      : copy.summary;
    return { kind, exitCode, status, summary, guidance: copy.guidance };
  }
  const copy = COPY.process_failure;
  const summary = exitCode === null
    ? "The assistant process was terminated before it finished."
    : `${copy.summary.replace(/\.$/, "")} (exit ${exitCode}).`;
  return { kind: "process_failure", exitCode, summary, guidance: copy.guidance };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.summary} ${diagnostic.guidance}`;
}
