import { argvError } from "../errors.js";
import type { ApprovalPolicy, CommandSpec, SandboxMode } from "./assistant-types.js";

export type CommandParams =
  | { operation: "login"; deviceAuth?: boolean }
  | { operation: "status" }
  | {
      operation: "exec";
      prompt: string;
      sandbox?: SandboxMode | null;
      approval?: ApprovalPolicy | null;
      extraArgs?: string[];
    }
  | { operation: "install"; prefix: string; packageName: string };

export const JSON_FLAG = "--json";
export const DEVICE_AUTH_FLAG = "--device-auth";
export const SANDBOX_FLAG = "--sandbox";
export const APPROVAL_FLAG = "--ask-for-approval";

/**
 * Build the argument vector that follows the executable (and entrypoint, for
 * runtime+script pairs). Flags sit right after the subcommand; free-form
 * arguments come last.
 */
export function buildCommand(params: CommandParams): CommandSpec {
  switch (params.operation) {
    case "login": {
      const argv = ["login"];
      if (params.deviceAuth) {
        argv.push(DEVICE_AUTH_FLAG);
      }
      return { operation: "login", argv };
    }
    case "status":
      return { operation: "status", argv: ["login", "status"] };
    case "exec": {
      if (params.prompt.trim().length === 0) {
        throw argvError("empty_prompt");
      }
      const argv = ["exec", JSON_FLAG];
      if (params.sandbox) {
        argv.push(SANDBOX_FLAG, params.sandbox);
      }
      if (params.approval) {
        argv.push(APPROVAL_FLAG, params.approval);
      }
      for (const arg of params.extraArgs ?? []) {
        if (arg.trim().length > 0) {
          argv.push(arg);
        }
      }
      // A prompt such as "--help" would otherwise be read as a flag.
      if (params.prompt.trimStart().startsWith("-")) {
        argv.push("--");
      }
      argv.push(params.prompt);
      return { operation: "exec", argv };
    }
    case "install": {
      const packageName = params.packageName.trim();
      if (!packageName) {
        throw argvError("empty_package");
      }
      return {
        operation: "install",
        argv: ["install", "--prefix", params.prefix, "--no-audit", "--no-fund", packageName],
      };
    }
  }
}

export function parseSandboxMode(value: string): SandboxMode | undefined {
  switch (value.trim().toLowerCase()) {
    case "read-only":
    case "readonly":
    case "ro":
      return "read-only";
    case "workspace-write":
    case "workspace":
    case "write":
    case "agent":
      return "workspace-write";
    case "danger-full-access":
    case "danger":
    case "full":
    case "full-access":
      return "danger-full-access";
    default:
      return undefined;
  }
}

export function parseApprovalPolicy(value: string): ApprovalPolicy | undefined {
  switch (value.trim().toLowerCase()) {
    case "untrusted":
      return "untrusted";
    case "on-failure":
    case "onfailure":
      return "on-failure";
    case "on-request":
    case "onrequest":
      return "on-request";
    case "never":
    case "none":
    case "off":
      return "never";
    default:
      return undefined;
  }
}
