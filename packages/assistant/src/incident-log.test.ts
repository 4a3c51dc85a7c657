import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileIncidentLog, formatIncident, maskSecrets } from "./incident-log.js";
import { createSilentLogger } from "./logger.js";

const at = new Date("2026-03-01T10:00:00.000Z");

describe("maskSecrets", () => {
  it("masks keys, bearer tokens and assignments", () => {
    expect(maskSecrets("used sk-testplaceholder1 for auth")).toBe("used sk-*** for auth");
    expect(maskSecrets("Authorization: Bearer test-secret")).toBe("Authorization: Bearer ***");
    expect(maskSecrets("OPENAI_API_KEY=test-secret rest")).toBe("OPENAI_API_KEY=*** rest");
    expect(maskSecrets("nothing to hide")).toBe("nothing to hide");
  });
});

describe("formatIncident", () => {
  it("writes a Markdown block", () => {
    expect(
      formatIncident({ severity: "error", context: "exec", message: "HTTP 401", details: "line one\nline two" }, at)
    ).toBe(
      "## 2026-03-01T10:00:00.000Z\n- severity: error\n- context: exec\n- message: HTTP 401\n- details: line one line two\n\n"
    );
  });

  it("omits empty details", () => {
    expect(formatIncident({ severity: "info", context: "install", message: "done", details: " " }, at)).toBe(
      "## 2026-03-01T10:00:00.000Z\n- severity: info\n- context: install\n- message: done\n\n"
    );
  });
});

describe("FileIncidentLog", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("appends masked blocks, creating the state directory", async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), "usbide-incidents-"));
    const file = path.join(dir, ".usbide", "incidents.md");
    const log = new FileIncidentLog(file, createSilentLogger(), () => at);

    await log.append({ severity: "warning", context: "exec", message: "token sk-testplaceholder1 rejected" });
    await log.append({ severity: "error", context: "install", message: "npm failed" });

    expect(readFileSync(file, "utf8")).toBe(
      "## 2026-03-01T10:00:00.000Z\n- severity: warning\n- context: exec\n- message: token sk-*** rejected\n\n" +
        "## 2026-03-01T10:00:00.000Z\n- severity: error\n- context: install\n- message: npm failed\n\n"
    );
  });

  it("never rejects when the file cannot be written", async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), "usbide-incidents-"));
    const blocker = path.join(dir, "not-a-dir");
    writeFileSync(blocker, "");
    const log = new FileIncidentLog(path.join(blocker, "incidents.md"), createSilentLogger());

    await expect(log.append({ severity: "error", context: "exec", message: "x" })).resolves.toBeUndefined();
  });
});
