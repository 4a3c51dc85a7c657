import path from "node:path";

export function isWindows(platform: NodeJS.Platform): boolean {
  return platform === "win32";
}

export function pathDelimiter(platform: NodeJS.Platform): string {
  return isWindows(platform) ? ";" : ":";
}

/**
 * Strip the `\\?\` and `\\?\UNC\` verbatim prefixes that cmd.exe and
 * PowerShell do not accept.
 */
export function pathForCommand(value: string, platform: NodeJS.Platform): string {
  if (!isWindows(platform)) {
    return value;
  }
  if (value.startsWith("\\\\?\\UNC\\")) {
    return `\\\\${value.slice("\\\\?\\UNC\\".length)}`;
  }
  if (value.startsWith("\\\\?\\")) {
    return value.slice("\\\\?\\".length);
  }
  return value;
}

/**
 * Look up a variable the way the target OS does: exact match first, then a
 * case-insensitive match on Windows.
 */
export function envLookup(
  env: Record<string, string | undefined>,
  key: string,
  platform: NodeJS.Platform
): string | undefined {
  const exact = env[key];
  if (exact !== undefined) {
    return exact;
  }
  if (!isWindows(platform)) {
    return undefined;
  }
  const lowered = key.toLowerCase();
  for (const [name, value] of Object.entries(env)) {
    if (name.toLowerCase() === lowered && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function splitSearchPath(value: string | undefined, platform: NodeJS.Platform): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(pathDelimiter(platform))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function hasPathSeparator(command: string, platform: NodeJS.Platform): boolean {
  return command.includes(path.sep) || command.includes("/") || (isWindows(platform) && command.includes("\\"));
}
