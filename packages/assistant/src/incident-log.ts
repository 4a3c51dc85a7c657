import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { errorLogFields } from "./errors.js";

export type IncidentSeverity = "info" | "warning" | "error";

export interface IncidentEntry {
  severity: IncidentSeverity;
  context: string;
  message: string;
  details?: string;
}

export interface IncidentLog {
  /** Never rejects; a failed write is only logged. */
  append(entry: IncidentEntry): Promise<void>;
}

const SECRET_PATTERNS: Array<[RegExp, string]> = [
  [/\b([A-Z][A-Z0-9_]*(?:KEY|TOKEN|SECRET|PASSWORD))=("[^"]*"|\S+)/g, "$1=***"],
  [/\bBearer\s+[A-Za-z0-9._~+/=-]+/gi, "Bearer ***"],
  [/\bsk-[A-Za-z0-9_-]{4,}/g, "sk-***"],
];

export function maskSecrets(text: string): string {
  let masked = text;
  for (const [pattern, replacement] of SECRET_PATTERNS) {
    masked = masked.replace(pattern, replacement);
  }
  return masked;
}

function singleLine(text: string): string {
  return maskSecrets(text).replace(/\s*\r?\n\s*/g, " ").trim();
}

export function formatIncident(entry: IncidentEntry, at: Date): string {
  const lines = [
    `## ${at.toISOString()}`,
    `- severity: ${entry.severity}`,
    `- context: ${singleLine(entry.context)}`,
    `- message: ${singleLine(entry.message)}`,
  ];
  if (entry.details !== undefined && entry.details.trim()) {
    lines.push(`- details: ${singleLine(entry.details)}`);
  }
  return lines.join("\n") + "\n\n";
}

export class FileIncidentLog implements IncidentLog {
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ module: "incident-log" });
  }

  async append(entry: IncidentEntry): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, formatIncident(entry, this.now()), "utf8");
    } catch (err) {
      this.logger.debug({ err: errorLogFields(err), path: this.filePath }, "Failed to append incident");
    }
  }
}
