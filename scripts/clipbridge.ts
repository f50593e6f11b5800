#!/usr/bin/env node
import process from "node:process";
import readline from "node:readline";
import {
  BridgeServer,
  createBridgeClient,
  createCommandClipboard,
  createLogger,
  parseArgs,
  resolveConfig,
  setLogLevel,
  type BridgeConfig,
} from "../packages/core";

const log = createLogger("cli");

function usage(): string {
  return [
    "Usage:",
    "  tsx scripts/clipbridge.ts [--host <addr>] [--port <n>] [--poll-ms <n>] [--log-level <level>]",
    "  tsx scripts/clipbridge.ts --connect <host[:port]> [--auto] [--log-level <level>]",
    "",
    "Serve mode shares this machine's clipboard with every connected peer.",
    "Connect mode copies text received from a server to this machine's clipboard,",
    "prints it, and sends each stdin line.",
    "",
    "Environment: CLIPBRIDGE_HOST, CLIPBRIDGE_PORT, CLIPBRIDGE_POLL_MS, CLIPBRIDGE_LOG_LEVEL",
  ].join("\n");
}

type Stoppable = { stop: () => Promise<void> };

async function serve(config: BridgeConfig): Promise<Stoppable> {
  log.info(`Starting clipbridge on ${config.host}:${config.port} (poll=${config.pollIntervalMs}ms)`);
  const server = new BridgeServer({
    clipboard: createCommandClipboard(),
    host: config.host,
    port: config.port,
    pollIntervalMs: config.pollIntervalMs,
  });
  await server.start();
  return { stop: () => server.shutdown() };
}

function connect(config: BridgeConfig): Stoppable {
  const target = config.target;
  if (!target) throw new Error("connect mode needs a target");
  const client = createBridgeClient({
    host: target.host,
    port: target.port,
    autoReconnect: config.autoReconnect,
    clipboard: createCommandClipboard(),
  });
  client.onText((text) => {
    console.log(`[clip] ${new Date().toISOString()}`);
    console.log(text);
    console.log("");
  });

  const lines = readline.createInterface({ input: process.stdin });
  lines.on("line", (line) => {
    if (!line) return;
    if (!client.send(line)) log.warn("Not connected; line dropped");
  });

  client.onStatus(({ status }) => {
    if (status === "disconnected" && !config.autoReconnect) {
      lines.close();
    }
  });
  client.start();
  return {
    stop: async () => {
      lines.close();
      client.stop();
    },
  };
}

async function main(): Promise<void> {
  const cli = parseArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(usage());
    return;
  }
  if (cli.unknown.length) {
    console.error(`Unknown arguments: ${cli.unknown.join(" ")}\n\n${usage()}`);
    process.exitCode = 2;
    return;
  }
  const config = resolveConfig(cli);
  setLogLevel(config.logLevel);

  const running = config.mode === "serve" ? await serve(config) : connect(config);
  let stopping = false;

  async function shutdown(signal: string) {
    if (stopping) return;
    stopping = true;
    log.info(`Received ${signal}, shutting down...`);
    const killTimer = setTimeout(() => {
      log.warn("Force exiting after timeout");
      process.exit(1);
    }, 5000).unref();
    try {
      await running.stop();
    } catch (err) {
      log.error("Error during shutdown", { error: err instanceof Error ? err.message : String(err) });
    } finally {
      clearTimeout(killTimer);
      process.exit(0);
    }
  }

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

main().catch((err) => {
  log.error("Fatal", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
