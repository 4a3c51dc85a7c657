import { describe, it, expect } from "vitest";
import { buildCommand, parseApprovalPolicy, parseSandboxMode } from "./command-builder.js";

describe("buildCommand", () => {
  it("builds login with and without device auth", () => {
    expect(buildCommand({ operation: "login" }).argv).toEqual(["login"]);
    expect(buildCommand({ operation: "login", deviceAuth: true }).argv).toEqual(["login", "--device-auth"]);
  });

  it("builds status", () => {
    expect(buildCommand({ operation: "status" })).toEqual({ operation: "status", argv: ["login", "status"] });
  });

  it("builds exec with flags before the prompt", () => {
    const spec = buildCommand({
      operation: "exec",
      prompt: "fix the tests",
      sandbox: "workspace-write",
      approval: "never",
    });
    expect(spec.argv).toEqual([
      "exec",
      "--json",
      "--sandbox",
      "workspace-write",
      "--ask-for-approval",
      "never",
      "fix the tests",
    ]);
  });

  it("omits flags the caller turned off", () => {
    const spec = buildCommand({ operation: "exec", prompt: "hi", sandbox: null, approval: null });
    expect(spec.argv).toEqual(["exec", "--json", "hi"]);
  });

  it("keeps extra args and drops blank ones", () => {
    const spec = buildCommand({ operation: "exec", prompt: "hi", extraArgs: ["--model", " ", "gpt-5"] });
    expect(spec.argv).toEqual(["exec", "--json", "--model", "gpt-5", "hi"]);
  });

  it("separates a prompt that looks like a flag", () => {
    const spec = buildCommand({ operation: "exec", prompt: "--help me" });
    expect(spec.argv).toEqual(["exec", "--json", "--", "--help me"]);
  });

  it("rejects a blank prompt", () => {
    expect(() => buildCommand({ operation: "exec", prompt: "   " })).toThrow("Prompt must not be empty");
  });

  it("builds install into the prefix", () => {
    const spec = buildCommand({ operation: "install", prefix: "/media/stick/.usbide/codex", packageName: " @openai/codex " });
    expect(spec.argv).toEqual([
      "install",
      "--prefix",
      "/media/stick/.usbide/codex",
      "--no-audit",
      "--no-fund",
      "@openai/codex",
    ]);
  });

  it("rejects a blank package", () => {
    expect(() => buildCommand({ operation: "install", prefix: "/p", packageName: "" })).toThrow(
      "Package name must not be empty"
    );
  });
});

describe("policy parsing", () => {
  it("accepts sandbox aliases", () => {
    expect(parseSandboxMode("RO")).toBe("read-only");
    expect(parseSandboxMode("agent")).toBe("workspace-write");
    expect(parseSandboxMode("danger")).toBe("danger-full-access");
    expect(parseSandboxMode("nope")).toBeUndefined();
  });

  it("accepts approval aliases", () => {
    expect(parseApprovalPolicy("onrequest")).toBe("on-request");
    expect(parseApprovalPolicy("off")).toBe("never");
    expect(parseApprovalPolicy("???")).toBeUndefined();
  });
});
