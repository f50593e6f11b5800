/**
 * Peer side of the bridge: one TCP connection to a server, text frames in
 * both directions, optional reconnect after the link goes away.
 */
import net from "node:net";
import type { ClipboardPort } from "../clipboard/port";
import { EventBus } from "./events";
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_PORT, DEFAULT_RETRY_DELAY_MS } from "./constants";
import { decodeText, encodeFrame, FrameReader, type Frame } from "../protocol/frame";
import { FrameError, InvalidPayloadError, PayloadTooLargeError } from "../protocol/errors";
import { createLogger } from "../logger";

const log = createLogger("client");

export type ClientStatus = "idle" | "connecting" | "connected" | "waiting" | "disconnected";

export type ClientStatusEvent = { status: ClientStatus; endpoint: string };

export interface ClientSocket {
  readonly destroyed: boolean;
  write(data: Uint8Array): boolean;
  destroy(): void;
  on(event: "connect", listener: () => void): unknown;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "close", listener: (hadError: boolean) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type SocketFactory = (host: string, port: number) => ClientSocket;

export interface BridgeClientOptions {
  host: string;
  port?: number;
  /** Keep retrying every `retryDelayMs` until `stop()` is called. */
  autoReconnect?: boolean;
  retryDelayMs?: number;
  connectTimeoutMs?: number;
  openSocket?: SocketFactory;
  /** Every received text is written here, in arrival order. */
  clipboard?: ClipboardPort;
}

export interface BridgeClient {
  start(): void;
  stop(): void;
  /** False when not connected or when the text cannot be framed. */
  send(text: string): boolean;
  status(): ClientStatus;
  onText(handler: (text: string) => void): () => void;
  onStatus(handler: (event: ClientStatusEvent) => void): () => void;
  /** Resolves once every received text has been written to the clipboard. */
  settled(): Promise<void>;
}

const openTcpSocket: SocketFactory = (host, port) => net.connect({ host, port, noDelay: true });

export function createBridgeClient(options: BridgeClientOptions): BridgeClient {
  const host = options.host;
  const port = options.port ?? DEFAULT_PORT;
  const endpoint = `${host}:${port}`;
  const autoReconnect = options.autoReconnect ?? false;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const openSocket = options.openSocket ?? openTcpSocket;
  const clipboard = options.clipboard;

  const textBus = new EventBus<string>();
  const statusBus = new EventBus<ClientStatusEvent>();

  let current: ClientSocket | null = null;
  let connected = false;
  let stopping = false;
  let state: ClientStatus = "idle";
  let retryTimer: ReturnType<typeof setTimeout> | undefined;
  let connectTimer: ReturnType<typeof setTimeout> | undefined;
  let writeChain: Promise<void> = Promise.resolve();

  function setStatus(next: ClientStatus) {
    if (state === next) return;
    state = next;
    log.info(`Status: ${next} (${endpoint})`);
    statusBus.emit({ status: next, endpoint });
  }

  function clearTimers() {
    if (retryTimer) clearTimeout(retryTimer);
    if (connectTimer) clearTimeout(connectTimer);
    retryTimer = undefined;
    connectTimer = undefined;
  }

  function apply(text: string) {
    textBus.emit(text);
    if (!clipboard) return;
    writeChain = writeChain
      .then(async () => {
        const ok = await clipboard.writeText(text);
        if (!ok) log.warn(`Could not write received text to the clipboard (${text.length} chars)`);
      })
      .catch((err) => {
        log.warn("Clipboard write failed", { error: err instanceof Error ? err.message : String(err) });
      });
  }

  function deliver(socket: ClientSocket, reader: FrameReader) {
    for (;;) {
      let frame: Frame | null;
      try {
        frame = reader.next();
      } catch (err) {
        if (!(err instanceof FrameError)) throw err;
        log.warn(`Protocol error from ${endpoint}: ${err.message}`);
        socket.destroy();
        return;
      }
      if (!frame) return;
      let text: string;
      try {
        text = decodeText(frame);
      } catch (err) {
        if (!(err instanceof InvalidPayloadError)) throw err;
        log.warn(`UTF-8 decode failed from ${endpoint}`);
        continue;
      }
      apply(text);
    }
  }

  function connect() {
    if (stopping) return;
    clearTimers();
    setStatus("connecting");
    const reader = new FrameReader();
    const socket = openSocket(host, port);
    current = socket;

    connectTimer = setTimeout(() => {
      log.warn(`Connect to ${endpoint} timed out after ${connectTimeoutMs}ms`);
      socket.destroy();
    }, connectTimeoutMs);

    socket.on("connect", () => {
      if (connectTimer) clearTimeout(connectTimer);
      connectTimer = undefined;
      connected = true;
      setStatus("connected");
    });
    socket.on("data", (chunk) => {
      reader.append(chunk);
      deliver(socket, reader);
    });
    socket.on("error", (err) => {
      log.debug(`Socket error (${endpoint}): ${err.message}`);
    });
    socket.on("close", () => {
      if (current !== socket) return;
      current = null;
      connected = false;
      clearTimers();
      if (!stopping && autoReconnect) {
        setStatus("waiting");
        retryTimer = setTimeout(connect, retryDelayMs);
        return;
      }
      setStatus("disconnected");
    });
  }

  return {
    start() {
      if (current || retryTimer) return;
      stopping = false;
      connect();
    },
    stop() {
      stopping = true;
      clearTimers();
      const socket = current;
      current = null;
      connected = false;
      if (socket && !socket.destroyed) socket.destroy();
      setStatus("disconnected");
    },
    send(text: string) {
      if (!current || !connected) return false;
      let frame: Uint8Array;
      try {
        frame = encodeFrame(text);
      } catch (err) {
        if (!(err instanceof PayloadTooLargeError)) throw err;
        log.warn(`Not sending ${err.size} bytes: over the frame limit`);
        return false;
      }
      current.write(frame);
      return true;
    },
    status() {
      return state;
    },
    onText(handler) {
      return textBus.on(handler);
    },
    onStatus(handler) {
      return statusBus.on(handler);
    },
    settled() {
      return writeChain;
    },
  };
}
