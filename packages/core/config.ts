/**
 * Runtime configuration. Command-line flags win over environment variables,
 * which win over defaults.
 *
 * CLIPBRIDGE_HOST: address to bind (default: 0.0.0.0)
 * CLIPBRIDGE_PORT: TCP port (default: 28900)
 * CLIPBRIDGE_POLL_MS: clipboard poll interval, floor 50 (default: 300)
 * CLIPBRIDGE_LOG_LEVEL: debug | info | warn | error (default: info)
 */
import { clampPollInterval, DEFAULT_POLL_INTERVAL_MS } from "./clipboard/watcher";
import { DEFAULT_HOST, DEFAULT_PORT } from "./network/constants";
import { isLogLevel, warn, type LogLevel } from "./logger";

export type Mode = "serve" | "connect";

export interface BridgeConfig {
  mode: Mode;
  host: string;
  port: number;
  pollIntervalMs: number;
  logLevel: LogLevel;
  /** Set in connect mode. */
  target?: { host: string; port: number };
  autoReconnect: boolean;
  help: boolean;
}

export type CliOptions = {
  host?: string;
  port?: string;
  pollMs?: string;
  logLevel?: string;
  connect?: string;
  auto?: boolean;
  help?: boolean;
  unknown: string[];
};

export type Env = Record<string, string | undefined>;

export function coerceNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === "") return fallback;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function coercePort(value: string | undefined, fallback: number, source: string): number {
  if (value === undefined || value === "") return fallback;
  const n = coerceNumber(value, Number.NaN);
  if (!Number.isInteger(n) || n < 0 || n > 65_535) {
    warn(`Ignoring invalid port from ${source}: ${value}`);
    return fallback;
  }
  return n;
}

function coercePollInterval(value: string | undefined, fallback: number, source: string): number {
  if (value === undefined || value === "") return fallback;
  const n = coerceNumber(value, Number.NaN);
  if (Number.isNaN(n)) {
    warn(`Ignoring invalid poll interval from ${source}: ${value}`);
    return fallback;
  }
  return clampPollInterval(n);
}

function coerceLogLevel(value: string | undefined, fallback: LogLevel, source: string): LogLevel {
  if (value === undefined || value === "") return fallback;
  const lowered = value.toLowerCase();
  if (isLogLevel(lowered)) return lowered;
  warn(`Ignoring invalid log level from ${source}: ${value}`);
  return fallback;
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { unknown: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--host":
        opts.host = argv[i + 1];
        i++;
        break;
      case "--port":
      case "-p":
        opts.port = argv[i + 1];
        i++;
        break;
      case "--poll-ms":
        opts.pollMs = argv[i + 1];
        i++;
        break;
      case "--log-level":
        opts.logLevel = argv[i + 1];
        i++;
        break;
      case "--verbose":
      case "-v":
        opts.logLevel = "debug";
        break;
      case "--connect":
        opts.connect = argv[i + 1];
        i++;
        break;
      case "--auto":
        opts.auto = true;
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        opts.unknown.push(arg);
        break;
    }
  }
  return opts;
}

/** `host`, `host:port` or `[v6addr]:port`. */
export function parseEndpoint(value: string, defaultPort = DEFAULT_PORT): { host: string; port: number } | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    const port = bracketed[2] === undefined ? defaultPort : Number(bracketed[2]);
    return port <= 65_535 ? { host: bracketed[1], port } : null;
  }
  const idx = trimmed.lastIndexOf(":");
  if (idx < 0 || trimmed.indexOf(":") !== idx) return { host: trimmed, port: defaultPort };
  const host = trimmed.slice(0, idx);
  const portText = trimmed.slice(idx + 1);
  if (!host || !/^\d+$/.test(portText)) return null;
  const port = Number(portText);
  return port <= 65_535 ? { host, port } : null;
}

export function resolveConfig(cli: CliOptions, env: Env = process.env): BridgeConfig {
  const host = cli.host || env.CLIPBRIDGE_HOST || DEFAULT_HOST;
  const port = coercePort(cli.port, coercePort(env.CLIPBRIDGE_PORT, DEFAULT_PORT, "CLIPBRIDGE_PORT"), "--port");
  const pollIntervalMs = coercePollInterval(
    cli.pollMs,
    coercePollInterval(env.CLIPBRIDGE_POLL_MS, DEFAULT_POLL_INTERVAL_MS, "CLIPBRIDGE_POLL_MS"),
    "--poll-ms"
  );
  const logLevel = coerceLogLevel(
    cli.logLevel,
    coerceLogLevel(env.CLIPBRIDGE_LOG_LEVEL, "info", "CLIPBRIDGE_LOG_LEVEL"),
    "--log-level"
  );

  let target: BridgeConfig["target"];
  if (cli.connect !== undefined) {
    const parsed = parseEndpoint(cli.connect, port);
    if (!parsed) throw new Error(`Invalid --connect endpoint: ${cli.connect}`);
    target = parsed;
  }

  return {
    mode: target ? "connect" : "serve",
    host,
    port,
    pollIntervalMs,
    logLevel,
    target,
    autoReconnect: cli.auto ?? false,
    help: cli.help ?? false,
  };
}
