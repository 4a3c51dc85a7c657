import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "pino";
import { parseApprovalPolicy, parseSandboxMode } from "./assistant/command-builder.js";
import type { ApprovalPolicy, SandboxMode } from "./assistant/assistant-types.js";

const LogConfigSchema = z
  .object({
    level: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .optional(),
    format: z.enum(["pretty", "json"]).optional(),
  })
  .strict();

const AssistantConfigSchema = z
  .object({
    allowApiKey: z.boolean().optional(),
    allowCustomBase: z.boolean().optional(),
    deviceAuth: z.boolean().optional(),
    autoInstall: z.boolean().optional(),
    npmPackage: z.string().trim().min(1).optional(),
    sandbox: z.enum(["read-only", "workspace-write", "danger-full-access"]).optional(),
    approval: z.enum(["untrusted", "on-failure", "on-request", "never"]).optional(),
  })
  .strict();

export const PersistedConfigSchema = z
  .object({
    version: z.literal(1).optional(),
    log: LogConfigSchema.optional(),
    assistant: AssistantConfigSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

export const DEFAULT_NPM_PACKAGE = "@openai/codex";

const DEFAULT_PERSISTED_CONFIG: PersistedConfig = PersistedConfigSchema.parse({
  version: 1,
  log: {
    level: "info",
    format: "pretty",
  },
  assistant: {
    allowApiKey: false,
    allowCustomBase: false,
    deviceAuth: false,
    autoInstall: true,
    npmPackage: DEFAULT_NPM_PACKAGE,
    sandbox: "workspace-write",
    approval: "never",
  },
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
    .join("\n");
}

export function loadPersistedConfig(configPath: string, logger?: Logger): PersistedConfig {
  const log = logger?.child({ module: "config" });

  if (!existsSync(configPath)) {
    try {
      mkdirSync(path.dirname(configPath), { recursive: true });
      writeFileSync(configPath, JSON.stringify(DEFAULT_PERSISTED_CONFIG, null, 2) + "\n");
      log?.info(`Initialized config file at ${configPath}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`[Config] Failed to initialize ${configPath}: ${message}`);
    }
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to read ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${message}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`[Config] Invalid config in ${configPath}:\n${formatIssues(result.error)}`);
  }

  log?.debug(`Loaded from ${configPath}`);
  return result.data;
}

export function savePersistedConfig(
  configPath: string,
  config: PersistedConfig,
  logger?: Logger
): void {
  const log = logger?.child({ module: "config" });
  const result = PersistedConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`[Config] Invalid config to save:\n${formatIssues(result.error)}`);
  }

  try {
    writeFileSync(configPath, JSON.stringify(result.data, null, 2) + "\n");
    log?.info(`Saved to ${configPath}`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to write ${configPath}: ${message}`);
  }
}

export interface AssistantSettings {
  allowApiKey: boolean;
  allowCustomBase: boolean;
  deviceAuth: boolean;
  autoInstall: boolean;
  npmPackage: string;
  sandbox: SandboxMode;
  approval: ApprovalPolicy;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

export function parseTruthy(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return undefined;
}

/**
 * Merge the caller-facing override switches. Environment variables win over
 * config.json, config.json wins over defaults.
 */
export function resolveAssistantSettings(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): AssistantSettings {
  const fromFile = persistedConfig?.assistant ?? {};
  const envPackage = env.USBIDE_CODEX_NPM_PACKAGE?.trim();

  // Opt-in switches are only enabled by an explicit truthy value.
  const optIn = (value: string | undefined, fallback: boolean | undefined): boolean =>
    value !== undefined ? parseTruthy(value) === true : fallback ?? false;

  // Auto-install stays on unless explicitly disabled.
  const envAutoInstall = env.USBIDE_CODEX_AUTO_INSTALL;
  const autoInstall =
    envAutoInstall !== undefined
      ? parseTruthy(envAutoInstall) !== false
      : fromFile.autoInstall ?? true;

  return {
    allowApiKey: optIn(env.USBIDE_CODEX_ALLOW_API_KEY, fromFile.allowApiKey),
    allowCustomBase: optIn(env.USBIDE_CODEX_ALLOW_CUSTOM_BASE, fromFile.allowCustomBase),
    deviceAuth: optIn(env.USBIDE_CODEX_DEVICE_AUTH, fromFile.deviceAuth),
    autoInstall,
    npmPackage: envPackage && envPackage.length > 0 ? envPackage : fromFile.npmPackage ?? DEFAULT_NPM_PACKAGE,
    sandbox:
      (env.USBIDE_CODEX_SANDBOX !== undefined ? parseSandboxMode(env.USBIDE_CODEX_SANDBOX) : undefined) ??
      fromFile.sandbox ??
      "workspace-write",
    approval:
      (env.USBIDE_CODEX_APPROVAL !== undefined ? parseApprovalPolicy(env.USBIDE_CODEX_APPROVAL) : undefined) ??
      fromFile.approval ??
      "never",
  };
}
