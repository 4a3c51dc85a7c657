export * from "./assistant/assistant-types.js";
export * from "./assistant/assistant-session.js";
export * from "./assistant/cli-notices.js";
export * from "./assistant/command-builder.js";
export * from "./assistant/diagnostics.js";
export * from "./assistant/environment-builder.js";
export * from "./assistant/process-runner.js";
export * from "./assistant/protocol-stream-parser.js";
export * from "./assistant/tool-resolver.js";
export * from "./errors.js";
export * from "./incident-log.js";
export * from "./logger.js";
export * from "./path-utils.js";
export * from "./persisted-config.js";
export * from "./workspace-root.js";
