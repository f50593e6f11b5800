import { spawn } from "node:child_process";
import type { ClipboardPort, ClipboardReadResult } from "./port";
import { createLogger } from "../logger";

const log = createLogger("clipboard");

export type CommandResult =
  | { status: "exited"; exitCode: number; stdout: string }
  | { status: "missing" }
  | { status: "failed"; error: Error };

export type CommandOptions = {
  /** Written to stdin when present; stdout is captured otherwise. */
  input?: string;
  timeoutMs: number;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

export type ClipboardTool = {
  command: string;
  args: readonly string[];
};

export const DEFAULT_READ_TOOLS: readonly ClipboardTool[] = [
  { command: "wl-paste", args: ["--type", "text", "--no-newline"] },
  { command: "xclip", args: ["-selection", "clipboard", "-out"] },
  { command: "xsel", args: ["--clipboard", "--output"] },
];

export const DEFAULT_WRITE_TOOLS: readonly ClipboardTool[] = [
  { command: "wl-copy", args: ["--type", "text"] },
  { command: "xclip", args: ["-selection", "clipboard", "-in"] },
  { command: "xsel", args: ["--clipboard", "--input"] },
];

export const DEFAULT_WRITE_TIMEOUT_MS = 1000;

export type CommandClipboardOptions = {
  readTools?: readonly ClipboardTool[];
  writeTools?: readonly ClipboardTool[];
  writeTimeoutMs?: number;
  run?: CommandRunner;
};

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run a command with a hard timeout. Writers only wait for the process to
 * exit because tools such as wl-copy and xclip leave a child behind to own
 * the selection.
 */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve) => {
    const writing = options.input !== undefined;
    const chunks: Buffer[] = [];
    let settled = false;

    const child = spawn(command, [...args], {
      stdio: writing ? ["pipe", "ignore", "ignore"] : ["ignore", "pipe", "ignore"],
    });

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      finish({ status: "failed", error: new Error(`${command} timed out after ${options.timeoutMs}ms`) });
    }, options.timeoutMs);

    child.on("error", (err) => {
      const missing = "code" in err && err.code === "ENOENT";
      finish(missing ? { status: "missing" } : { status: "failed", error: err });
    });

    if (writing) {
      child.on("exit", (code) => {
        finish({ status: "exited", exitCode: code ?? -1, stdout: "" });
      });
      child.stdin?.on("error", (err) => {
        log.debug(`${command} stdin closed early`, { error: err.message });
      });
      child.stdin?.end(options.input ?? "", "utf8");
    } else {
      child.stdout?.on("data", (chunk: Buffer) => chunks.push(chunk));
      child.on("close", (code) => {
        finish({ status: "exited", exitCode: code ?? -1, stdout: Buffer.concat(chunks).toString("utf8") });
      });
    }
  });

/**
 * Clipboard backed by command-line tools, tried in priority order. The tool
 * that last ran is remembered per direction and tried first next time.
 * With no tool installed every read fails and every write is a no-op.
 *
 * A writer counts as successful only when it exits 0. A non-zero exit or a
 * timeout moves on to the next tool, and `writeText` resolves false when
 * none of them succeeds.
 */
export function createCommandClipboard(options: CommandClipboardOptions = {}): ClipboardPort {
  const readTools = options.readTools ?? DEFAULT_READ_TOOLS;
  const writeTools = options.writeTools ?? DEFAULT_WRITE_TOOLS;
  const writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
  const run = options.run ?? spawnCommand;

  let preferredReader: ClipboardTool | undefined;
  let preferredWriter: ClipboardTool | undefined;
  let warnedNoWriter = false;

  function ordered(tools: readonly ClipboardTool[], preferred?: ClipboardTool): ClipboardTool[] {
    if (!preferred) return [...tools];
    return [preferred, ...tools.filter((t) => t !== preferred)];
  }

  async function invoke(tool: ClipboardTool, opts: CommandOptions): Promise<CommandResult> {
    try {
      return await run(tool.command, tool.args, opts);
    } catch (err) {
      return { status: "failed", error: asError(err) };
    }
  }

  async function readText(timeoutMs: number): Promise<ClipboardReadResult> {
    for (const tool of ordered(readTools, preferredReader)) {
      const result = await invoke(tool, { timeoutMs });
      if (result.status === "missing") {
        if (preferredReader === tool) preferredReader = undefined;
        continue;
      }
      preferredReader = tool;
      if (result.status === "failed") {
        log.debug(`${tool.command} read failed`, { error: result.error.message });
        return { ok: false };
      }
      if (result.exitCode === 0) return { ok: true, text: result.stdout };
      log.debug(`${tool.command} read exited with ${result.exitCode}`);
    }
    return { ok: false };
  }

  async function writeText(text: string): Promise<boolean> {
    let found = false;
    for (const tool of ordered(writeTools, preferredWriter)) {
      const result = await invoke(tool, { input: text, timeoutMs: writeTimeoutMs });
      if (result.status === "missing") {
        if (preferredWriter === tool) preferredWriter = undefined;
        continue;
      }
      found = true;
      if (result.status === "failed") {
        log.debug(`${tool.command} write failed`, { error: result.error.message });
        continue;
      }
      if (result.exitCode === 0) {
        preferredWriter = tool;
        return true;
      }
      log.debug(`${tool.command} write exited with ${result.exitCode}`);
    }
    if (!found && !warnedNoWriter) {
      warnedNoWriter = true;
      log.warn("No clipboard writer available");
    } else if (found) {
      log.warn("Clipboard write failed with every available tool");
    }
    return false;
  }

  return { readText, writeText };
}
