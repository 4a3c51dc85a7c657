export type RejectedFlag = "sandbox" | "approval";

function mentionsUnknownArgument(lower: string): boolean {
  return (
    lower.includes("unexpected argument") ||
    lower.includes("unknown argument") ||
    lower.includes("unrecognized")
  );
}

/**
 * Recognize the CLI refusing one of the optional exec flags. Used to drop
 * the flag from the next invocation.
 */
export function detectRejectedFlag(line: string): RejectedFlag | undefined {
  const lower = line.trim().toLowerCase();
  if (lower.startsWith("tip:")) {
    return undefined;
  }
  if (lower.includes("--ask-for-approval") && mentionsUnknownArgument(lower)) {
    return "approval";
  }
  if (lower.includes("--sandbox") && (mentionsUnknownArgument(lower) || lower.includes("invalid value"))) {
    return "sandbox";
  }
  return undefined;
}

/**
 * Rewrite a plain-text CLI line (usage banners, clap errors, login and npm
 * chatter) into a short notice. Lines we don't know return undefined.
 */
export function translateCliLine(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed) {
    return undefined;
  }
  const lower = trimmed.toLowerCase();

  if (lower.includes("--ask-for-approval") && mentionsUnknownArgument(lower)) {
    return "Error: this assistant version does not recognize --ask-for-approval.";
  }
  if (lower.startsWith("tip:") && lower.includes("--ask-for-approval")) {
    return "Tip: to pass --ask-for-approval as a value, write -- --ask-for-approval.";
  }
  if (lower.startsWith("usage: codex exec")) {
    return "Usage: codex exec --json --sandbox <SANDBOX_MODE> [PROMPT].";
  }
  if (lower.startsWith("for more information") || lower.includes("try '--help'")) {
    return "For more information, run with --help.";
  }
  if (lower.startsWith("error:")) {
    if (mentionsUnknownArgument(lower)) {
      return "Error: unknown or invalid option. See --help.";
    }
    return "Error: invalid assistant command. See --help.";
  }
  if (lower.startsWith("logged in using")) {
    return "Logged in with ChatGPT.";
  }
  if (lower.startsWith("up to date in")) {
    return "Up to date.";
  }
  return undefined;
}

export function rejectedFlagNotice(flag: RejectedFlag): string {
  const name = flag === "sandbox" ? "--sandbox" : "--ask-for-approval";
  return `This assistant version does not accept ${name}; the next request will omit it.`;
}
