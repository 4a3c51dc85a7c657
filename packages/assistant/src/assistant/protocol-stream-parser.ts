import { z } from "zod";
import type { DisplayEvent, ProtocolMessage, RawLine } from "./assistant-types.js";
import { detectRejectedFlag, rejectedFlagNotice, translateCliLine } from "./cli-notices.js";
import { extractStatusCode } from "./diagnostics.js";

export const MALFORMED_NOTICE_THRESHOLD = 5;

type JsonObject = Record<string, unknown>;

const RecordEnvelopeSchema = z.object({ type: z.string().min(1) }).passthrough();

type DedupKind = "user_message" | "assistant_message" | "action";

type ActionDescription = { label: string; payload?: string };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type PendingEvent = DistributiveOmit<DisplayEvent, "index">;

type AssistantBuffer = Extract<ProtocolMessage, { type: "assistant_message" }>;

export interface ParserSnapshot {
  records: number;
  skipped: number;
  suppressed: number;
  lastErrorMessage: string | null;
  lastTransportStatus: number | null;
  threadId: string | null;
  sandboxRejected: boolean;
  approvalRejected: boolean;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(source: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string") {
      return value;
    }
  }
  return undefined;
}

function objectField(source: JsonObject, key: string): JsonObject | undefined {
  const value = source[key];
  return isObject(value) ? value : undefined;
}

export function normalizeContent(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function dedupKey(kind: string, content: string): string {
  return `${kind}:${normalizeContent(content)}`;
}

/** Text parts of a `content` value: a string, or an array of `{ text }` parts. */
function contentTexts(content: unknown): string[] {
  if (typeof content === "string") {
    return [content];
  }
  if (!Array.isArray(content)) {
    return [];
  }
  const texts: string[] = [];
  for (const part of content) {
    if (typeof part === "string") {
      texts.push(part);
    } else if (isObject(part)) {
      const text = stringField(part, "text");
      if (text !== undefined) texts.push(text);
    }
  }
  return texts;
}

function messageTexts(source: JsonObject): string[] {
  const texts = contentTexts(source.content);
  const direct = stringField(source, "text", "message");
  if (direct !== undefined) {
    texts.push(direct);
  }
  return texts.filter((text) => text.trim().length > 0);
}

function stringifyArgument(value: unknown): string {
  if (typeof value === "string") return value;
  if (isObject(value) || Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

const ACTION_TYPES = new Set(["tool_call", "function_call", "action", "tool"]);
const NAME_KEYS = ["name", "tool", "tool_name", "id"];
const ARGUMENT_KEYS = ["arguments", "args", "input", "parameters"];

/**
 * Describe a generic tool invocation: an explicit tool/function call, or any
 * object carrying both a name and arguments.
 */
export function describeAction(source: JsonObject): ActionDescription | undefined {
  const rawType = (stringField(source, "type") ?? "").toLowerCase();
  const hasName = ["name", "tool", "tool_name"].some((key) => source[key] !== undefined);
  const hasArgs = ARGUMENT_KEYS.some((key) => source[key] !== undefined);
  if (!ACTION_TYPES.has(rawType) && !(hasName && hasArgs)) {
    return undefined;
  }

  const nameKey = NAME_KEYS.find((key) => source[key] !== undefined && source[key] !== null);
  const argsKey = ARGUMENT_KEYS.find((key) => source[key] !== undefined && source[key] !== null);
  const name = nameKey ? stringifyArgument(source[nameKey]).trim() : "";
  const args = argsKey ? stringifyArgument(source[argsKey]).trim() : "";

  if (!name && !args) {
    const description = stringField(source, "message", "description")?.trim();
    return description ? { label: description } : undefined;
  }
  if (!name) {
    return { label: "tool", payload: args };
  }
  return args ? { label: name, payload: args } : { label: name };
}

function commandText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value.map((part) => String(part)).join(" ");
  return "command";
}

/** Actions for the typed thread items the exec stream reports. */
function describeThreadItem(item: JsonObject): ActionDescription | undefined {
  switch (stringField(item, "type")) {
    case "command_execution":
      return { label: "command", payload: commandText(item.command) };
    case "file_change": {
      const changes = Array.isArray(item.changes) ? item.changes : [];
      const paths = changes
        .filter(isObject)
        .map((change) => stringField(change, "path"))
        .filter((path): path is string => path !== undefined);
      return paths.length > 0 ? { label: "file_change", payload: paths.join(", ") } : { label: "file_change" };
    }
    case "mcp_tool_call": {
      const server = stringField(item, "server") ?? "mcp";
      const tool = stringField(item, "tool") ?? "tool";
      const args = item.arguments ?? item.input;
      return args === undefined
        ? { label: `${server}.${tool}` }
        : { label: `${server}.${tool}`, payload: stringifyArgument(args) };
    }
    case "web_search": {
      const query = stringField(item, "query");
      return query ? { label: "web_search", payload: query } : { label: "web_search" };
    }
    default:
      return describeAction(item);
  }
}

function collectToolCalls(containers: Array<JsonObject | undefined>): JsonObject[] {
  const calls: JsonObject[] = [];
  for (const container of containers) {
    if (!container) continue;
    const single = objectField(container, "tool_call");
    if (single) calls.push(single);
    const list = container.tool_calls ?? container.tools;
    if (Array.isArray(list)) {
      calls.push(...list.filter(isObject));
    }
  }
  return calls;
}

/**
 * Decodes one exec invocation's line-delimited JSON stream into display
 * events. Create a fresh parser per invocation.
 */
export class ProtocolStreamParser {
  private nextIndex = 0;
  private assistant: AssistantBuffer | null = null;
  private promptKey: string | null = null;
  private readonly lastKeys = new Map<DedupKind, string>();
  private skippedStreak = 0;
  private records = 0;
  private skipped = 0;
  private suppressed = 0;
  private lastErrorMessage: string | null = null;
  private lastTransportStatus: number | null = null;
  private threadId: string | null = null;
  private sandboxRejected = false;
  private approvalRejected = false;

  feed(line: RawLine): DisplayEvent[] {
    const text = line.text.trim();
    if (!text) {
      return [];
    }
    const out: DisplayEvent[] = [];

    if (line.stream === "stdout" && text.startsWith("{")) {
      const record = this.parseRecord(text);
      if (record) {
        this.records += 1;
        this.skippedStreak = 0;
        this.handleRecord(record, out);
        return out;
      }
    }

    this.handlePlainLine(text, out);
    return out;
  }

  /**
   * Record the prompt this invocation sent as the first user turn. The CLI's
   * own echo of it is dropped later, whichever turn it arrives in.
   */
  prompt(text: string): DisplayEvent[] {
    const out: DisplayEvent[] = [];
    const cleaned = text.trim();
    if (!cleaned) {
      return out;
    }
    const key = dedupKey("user_message", cleaned);
    this.promptKey = key;
    this.lastKeys.set("user_message", key);
    this.push(out, { type: "user_message", text: cleaned });
    return out;
  }

  /** Emit whatever the stream left open. Call once, after the last line. */
  flush(): DisplayEvent[] {
    const out: DisplayEvent[] = [];
    this.closeBuffer(out);
    return out;
  }

  snapshot(): ParserSnapshot {
    return {
      records: this.records,
      skipped: this.skipped,
      suppressed: this.suppressed,
      lastErrorMessage: this.lastErrorMessage,
      lastTransportStatus: this.lastTransportStatus,
      threadId: this.threadId,
      sandboxRejected: this.sandboxRejected,
      approvalRejected: this.approvalRejected,
    };
  }

  private parseRecord(text: string): z.infer<typeof RecordEnvelopeSchema> | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return null;
    }
    const result = RecordEnvelopeSchema.safeParse(parsed);
    return result.success ? result.data : null;
  }

  private handlePlainLine(text: string, out: DisplayEvent[]): void {
    const rejected = detectRejectedFlag(text);
    if (rejected) {
      this.skippedStreak = 0;
      const alreadyKnown = rejected === "sandbox" ? this.sandboxRejected : this.approvalRejected;
      if (rejected === "sandbox") this.sandboxRejected = true;
      else this.approvalRejected = true;
      if (!alreadyKnown) {
        this.push(out, { type: "notice", text: rejectedFlagNotice(rejected) });
      }
      return;
    }

    const notice = translateCliLine(text);
    if (notice) {
      this.skippedStreak = 0;
      this.push(out, { type: "notice", text: notice });
      return;
    }

    this.skipped += 1;
    this.skippedStreak += 1;
    if (this.skippedStreak === MALFORMED_NOTICE_THRESHOLD) {
      this.push(out, {
        type: "notice",
        text: `Skipped ${MALFORMED_NOTICE_THRESHOLD} unreadable lines from the assistant output.`,
      });
    }
  }

  private handleRecord(record: JsonObject & { type: string }, out: DisplayEvent[]): void {
    switch (record.type) {
      case "thread.started":
        this.threadId = stringField(record, "thread_id") ?? this.threadId;
        return;
      case "turn.started":
        this.closeBuffer(out);
        this.lastKeys.clear();
        return;
      case "response.output_text.delta":
        this.append(stringField(record, "delta") ?? "");
        return;
      case "response.output_text":
        this.append(stringField(record, "text", "delta") ?? "");
        return;
      case "response.output_text.done": {
        const text = stringField(record, "text");
        if (!this.assistant?.open && text !== undefined) {
          this.emitMessage(out, "assistant_message", text);
          return;
        }
        this.closeBuffer(out);
        return;
      }
      case "response.output_item.done":
      case "response.completed":
      case "turn.completed":
        this.closeBuffer(out);
        return;
      case "error":
        this.emitError(out, stringField(record, "message") ?? "Assistant stream error");
        return;
      case "turn.failed": {
        const error = objectField(record, "error");
        const message = (error && stringField(error, "message", "text")) ?? "Assistant turn failed";
        this.emitError(out, message);
        return;
      }
      case "item.started":
      case "item.updated":
      case "item.completed": {
        const item = objectField(record, "item");
        if (item) {
          this.handleThreadItem(item, record.type === "item.completed", out);
        }
        return;
      }
      case "event_msg":
        this.handleEventMessage(objectField(record, "payload"), out);
        return;
      case "response_item":
        this.handleResponseItem(objectField(record, "payload"), out);
        return;
      default: {
        const action = describeAction(record);
        if (action) this.emitAction(out, action);
        for (const call of collectToolCalls([record, objectField(record, "payload"), objectField(record, "item")])) {
          const callAction = describeAction(call);
          if (callAction) this.emitAction(out, callAction);
        }
      }
    }
  }

  private handleThreadItem(item: JsonObject, completed: boolean, out: DisplayEvent[]): void {
    const itemType = stringField(item, "type");
    if (itemType === "agent_message" || itemType === "assistant_message") {
      if (completed) {
        for (const text of messageTexts(item)) this.emitMessage(out, "assistant_message", text);
      }
      return;
    }
    if (itemType === "user_message" || itemType === "user") {
      if (completed) {
        for (const text of messageTexts(item)) this.emitMessage(out, "user_message", text);
      }
      return;
    }
    if (itemType === "reasoning") {
      return;
    }
    const action = describeThreadItem(item);
    if (action) {
      this.emitAction(out, action);
    }
  }

  private handleEventMessage(payload: JsonObject | undefined, out: DisplayEvent[]): void {
    if (!payload) return;
    const text = stringField(payload, "message", "text");
    switch (stringField(payload, "type")) {
      case "agent_message":
      case "assistant_message":
        if (text) this.emitMessage(out, "assistant_message", text);
        return;
      case "user_message":
      case "user":
        if (text) this.emitMessage(out, "user_message", text);
        return;
      default: {
        const action = describeAction(payload);
        if (action) this.emitAction(out, action);
      }
    }
  }

  private handleResponseItem(payload: JsonObject | undefined, out: DisplayEvent[]): void {
    if (!payload) return;
    if (stringField(payload, "type") === "message") {
      const role = stringField(payload, "role");
      const kind = role === "assistant" ? "assistant_message" : role === "user" ? "user_message" : null;
      if (kind) {
        for (const text of messageTexts(payload)) this.emitMessage(out, kind, text);
      }
      return;
    }
    const action = describeAction(payload);
    if (action) this.emitAction(out, action);
    for (const call of collectToolCalls([payload])) {
      const callAction = describeAction(call);
      if (callAction) this.emitAction(out, callAction);
    }
  }

  private append(delta: string): void {
    if (!delta) return;
    let message = this.assistant;
    if (!message?.open) {
      message = { type: "assistant_message", buffer: "", open: true };
      this.assistant = message;
    }
    message.buffer += delta;
  }

  private closeBuffer(out: DisplayEvent[]): void {
    const message = this.assistant;
    if (!message?.open) {
      return;
    }
    message.open = false;
    if (message.buffer.trim()) {
      this.emitMessage(out, "assistant_message", message.buffer);
    }
  }

  private emitMessage(out: DisplayEvent[], kind: "user_message" | "assistant_message", text: string): void {
    this.closeBuffer(out);
    const cleaned = text.trim();
    if (kind === "user_message" && this.promptKey === dedupKey(kind, cleaned)) {
      this.promptKey = null;
      this.suppressed += 1;
      return;
    }
    if (!cleaned || this.isDuplicate(kind, cleaned)) {
      return;
    }
    this.push(out, { type: kind, text: cleaned });
  }

  private emitAction(out: DisplayEvent[], action: ActionDescription): void {
    this.closeBuffer(out);
    const text = action.payload ? `${action.label}: ${action.payload}` : action.label;
    if (this.isDuplicate("action", text)) {
      return;
    }
    const event: PendingEvent = action.payload
      ? { type: "action", label: action.label, payload: action.payload, text }
      : { type: "action", label: action.label, text };
    this.push(out, event);
  }

  private emitError(out: DisplayEvent[], message: string): void {
    this.closeBuffer(out);
    const transportStatus = extractStatusCode(message);
    this.lastErrorMessage = message;
    this.lastTransportStatus = transportStatus ?? null;
    const event: PendingEvent = transportStatus === undefined
      ? { type: "error", message }
      : { type: "error", message, transportStatus };
    this.push(out, event);
  }

  private isDuplicate(kind: DedupKind, content: string): boolean {
    const key = dedupKey(kind, content);
    if (this.lastKeys.get(kind) === key) {
      this.suppressed += 1;
      return true;
    }
    this.lastKeys.set(kind, key);
    return false;
  }

  private push(out: DisplayEvent[], event: PendingEvent): void {
    out.push({ ...event, index: this.nextIndex++ });
  }
}
