import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  DEFAULT_NPM_PACKAGE,
  loadPersistedConfig,
  parseTruthy,
  resolveAssistantSettings,
  savePersistedConfig,
} from "./persisted-config.js";

describe("loadPersistedConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "usbide-config-"));
    configPath = path.join(dir, ".usbide", "config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes defaults when the file is missing", () => {
    const config = loadPersistedConfig(configPath);
    expect(config.version).toBe(1);
    expect(config.assistant?.npmPackage).toBe(DEFAULT_NPM_PACKAGE);
    expect(config.assistant?.autoInstall).toBe(true);
    const onDisk: unknown = JSON.parse(readFileSync(configPath, "utf8"));
    expect(onDisk).toEqual(config);
  });

  it("rejects unknown keys", () => {
    loadPersistedConfig(configPath);
    writeFileSync(configPath, JSON.stringify({ version: 1, daemon: {} }));
    expect(() => loadPersistedConfig(configPath)).toThrow(/\[Config\] Invalid config/);
  });

  it("rejects invalid JSON", () => {
    loadPersistedConfig(configPath);
    writeFileSync(configPath, "{ not json");
    expect(() => loadPersistedConfig(configPath)).toThrow(/\[Config\] Invalid JSON/);
  });

  it("round-trips through savePersistedConfig", () => {
    loadPersistedConfig(configPath);
    savePersistedConfig(configPath, { version: 1, assistant: { sandbox: "read-only" } });
    expect(loadPersistedConfig(configPath)).toEqual({ version: 1, assistant: { sandbox: "read-only" } });
  });
});

describe("parseTruthy", () => {
  it("recognizes truthy and falsy spellings", () => {
    expect(parseTruthy("1")).toBe(true);
    expect(parseTruthy(" Yes ")).toBe(true);
    expect(parseTruthy("off")).toBe(false);
    expect(parseTruthy("maybe")).toBeUndefined();
    expect(parseTruthy(undefined)).toBeUndefined();
  });
});

describe("resolveAssistantSettings", () => {
  it("applies defaults", () => {
    expect(resolveAssistantSettings(undefined, {})).toEqual({
      allowApiKey: false,
      allowCustomBase: false,
      deviceAuth: false,
      autoInstall: true,
      npmPackage: "@openai/codex",
      sandbox: "workspace-write",
      approval: "never",
    });
  });

  it("lets env switches win over the file", () => {
    const settings = resolveAssistantSettings(
      { assistant: { allowApiKey: true, sandbox: "read-only", autoInstall: true } },
      {
        USBIDE_CODEX_ALLOW_API_KEY: "0",
        USBIDE_CODEX_SANDBOX: "full",
        USBIDE_CODEX_AUTO_INSTALL: "no",
        USBIDE_CODEX_NPM_PACKAGE: " @example/assistant ",
      }
    );
    expect(settings.allowApiKey).toBe(false);
    expect(settings.sandbox).toBe("danger-full-access");
    expect(settings.autoInstall).toBe(false);
    expect(settings.npmPackage).toBe("@example/assistant");
  });

  it("only enables opt-in switches on an explicit truthy value", () => {
    const settings = resolveAssistantSettings(undefined, {
      USBIDE_CODEX_ALLOW_CUSTOM_BASE: "sure",
      USBIDE_CODEX_DEVICE_AUTH: "on",
    });
    expect(settings.allowCustomBase).toBe(false);
    expect(settings.deviceAuth).toBe(true);
  });

  it("keeps auto-install on for unrecognized values", () => {
    expect(resolveAssistantSettings(undefined, { USBIDE_CODEX_AUTO_INSTALL: "later" }).autoInstall).toBe(true);
  });

  it("falls back when env policy values are unknown", () => {
    const settings = resolveAssistantSettings(
      { assistant: { approval: "on-request" } },
      { USBIDE_CODEX_APPROVAL: "sometimes", USBIDE_CODEX_SANDBOX: "???" }
    );
    expect(settings.approval).toBe("on-request");
    expect(settings.sandbox).toBe("workspace-write");
  });
});
