import { describe, it, expect } from "vitest";
import { createSilentLogger } from "../logger.js";
import type { RawLine, ToolCandidate } from "./assistant-types.js";
import { ChildProcessRunner, LineQueue, planLaunch, quoteForCmd } from "./process-runner.js";

const nodeCandidate: ToolCandidate = {
  origin: "path",
  executablePath: process.execPath,
  invocationStrategy: "direct",
};

const childEnv = { PATH: process.env.PATH ?? "" };

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe("planLaunch", () => {
  it("runs direct candidates as-is", () => {
    const plan = planLaunch(
      { origin: "path", executablePath: "/usr/bin/codex", invocationStrategy: "direct" },
      ["login", "status"],
      {},
      "linux"
    );
    expect(plan).toEqual({
      argv: ["/usr/bin/codex", "login", "status"],
      command: "/usr/bin/codex",
      args: ["login", "status"],
      windowsVerbatimArguments: false,
    });
  });

  it("puts the entrypoint after the runtime", () => {
    const plan = planLaunch(
      {
        origin: "portable",
        executablePath: "/stick/tools/node/bin/node",
        entrypointPath: "/stick/.usbide/codex/node_modules/@openai/codex/bin/codex.js",
        invocationStrategy: "direct",
      },
      ["exec", "--json", "hi"],
      {},
      "linux"
    );
    expect(plan.argv).toEqual([
      "/stick/tools/node/bin/node",
      "/stick/.usbide/codex/node_modules/@openai/codex/bin/codex.js",
      "exec",
      "--json",
      "hi",
    ]);
  });

  it("wraps .cmd shims with cmd.exe and a quoted command line", () => {
    const plan = planLaunch(
      { origin: "path", executablePath: "C:\\npm\\codex.cmd", invocationStrategy: "windows-cmd" },
      ["exec", "--json", "hi there"],
      { ComSpec: "C:\\Windows\\system32\\cmd.exe" },
      "win32"
    );
    expect(plan.argv).toEqual([
      "C:\\Windows\\system32\\cmd.exe",
      "/d",
      "/s",
      "/c",
      "C:\\npm\\codex.cmd",
      "exec",
      "--json",
      "hi there",
    ]);
    expect(plan.command).toBe("C:\\Windows\\system32\\cmd.exe");
    expect(plan.args).toEqual(["/d", "/s", "/c", '"C:\\npm\\codex.cmd ^"exec^" ^"--json^" ^"hi^ there^""']);
    expect(plan.windowsVerbatimArguments).toBe(true);
  });

  it("falls back to cmd.exe without COMSPEC", () => {
    const plan = planLaunch(
      { origin: "path", executablePath: "C:\\npm\\codex.bat", invocationStrategy: "windows-cmd" },
      ["login"],
      {},
      "win32"
    );
    expect(plan.argv.slice(0, 5)).toEqual(["cmd.exe", "/d", "/s", "/c", "C:\\npm\\codex.bat"]);
  });

  it("runs .ps1 shims with a process-scoped bypass", () => {
    const plan = planLaunch(
      { origin: "path", executablePath: "C:\\npm\\codex.ps1", invocationStrategy: "windows-powershell" },
      ["login", "status"],
      {},
      "win32"
    );
    expect(plan.argv).toEqual([
      "powershell",
      "-NoProfile",
      "-ExecutionPolicy",
      "Bypass",
      "-File",
      "C:\\npm\\codex.ps1",
      "login",
      "status",
    ]);
  });

  it("strips verbatim path prefixes on Windows", () => {
    const plan = planLaunch(
      { origin: "portable", executablePath: "\\\\?\\E:\\tools\\node\\node.exe", invocationStrategy: "direct" },
      ["--version"],
      {},
      "win32"
    );
    expect(plan.command).toBe("E:\\tools\\node\\node.exe");
  });

  it("rejects an empty argv", () => {
    expect(() => planLaunch(nodeCandidate, [], {}, "linux")).toThrow("Argument vector must not be empty");
  });
});

describe("quoteForCmd", () => {
  it("escapes quotes and trailing backslashes", () => {
    expect(quoteForCmd('say "hi"')).toBe('^"say^ \\^"hi\\^"^"');
    expect(quoteForCmd("C:\\dir\\")).toBe('^"C:\\dir\\\\^"');
  });
});

describe("LineQueue", () => {
  it("delivers buffered and late items, then ends", async () => {
    const queue = new LineQueue<number>();
    queue.push(1);
    const pending = collect(queue);
    queue.push(2);
    queue.end();
    queue.push(3);
    expect(await pending).toEqual([1, 2]);
    expect(queue.isEnded).toBe(true);
  });
});

describe("ChildProcessRunner", () => {
  const runner = new ChildProcessRunner({ logger: createSilentLogger() });

  it("streams stdout and stderr lines and reports the exit code", async () => {
    const script = [
      "process.stdout.write('one\\n');",
      "process.stderr.write('two\\n');",
      "process.stdout.write('three\\r\\n');",
      "setTimeout(() => process.exit(3), 20);",
    ].join("");
    const proc = runner.run({ candidate: nodeCandidate, argv: ["-e", script], env: childEnv });

    const lines: RawLine[] = await collect(proc.lines);
    const exit = await proc.exit;

    expect(exit).toEqual({ code: 3, signal: null });
    expect(lines.filter((l) => l.stream === "stdout").map((l) => l.text)).toEqual(["one", "three"]);
    expect(lines.filter((l) => l.stream === "stderr").map((l) => l.text)).toEqual(["two"]);
    expect(lines.map((l) => l.seq).sort()).toEqual([0, 1, 2]);
  });

  it("cancel() stops the child and ends the stream", async () => {
    const script = "console.log('ready'); setInterval(() => {}, 1000);";
    const proc = runner.run({ candidate: nodeCandidate, argv: ["-e", script], env: childEnv });

    const seen: string[] = [];
    for await (const line of proc.lines) {
      seen.push(line.text);
      if (line.text === "ready") {
        proc.cancel();
      }
    }

    expect(seen).toEqual(["ready"]);
    expect(await proc.exit).toEqual({ code: null, signal: "SIGTERM" });
  });

  it("rejects exit with a spawn error for a missing executable", async () => {
    const proc = runner.run({
      candidate: { origin: "path", executablePath: "/nonexistent/usbide-missing-tool", invocationStrategy: "direct" },
      argv: ["--version"],
      env: childEnv,
    });

    await expect(proc.exit).rejects.toMatchObject({ code: "spawn_failed", category: "spawn" });
    expect(await collect(proc.lines)).toEqual([]);
  });

  it("refuses an empty argv before spawning", () => {
    expect(() => runner.run({ candidate: nodeCandidate, argv: [], env: childEnv })).toThrow(
      "Argument vector must not be empty"
    );
  });
});
