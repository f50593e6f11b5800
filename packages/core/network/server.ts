/**
 * Broadcast server: accepts peers, relays every text frame a peer sends to
 * all other peers, writes it to the local clipboard, and pushes local
 * clipboard changes (queued by the watcher) out to everyone.
 */
import net, { type AddressInfo } from "node:net";
import type { ClipboardPort } from "../clipboard/port";
import {
  createClipboardWatcher,
  DEFAULT_READ_TIMEOUT_MS,
  type ClipboardWatcher,
  type TickOutcome,
} from "../clipboard/watcher";
import { ClipboardSyncState } from "../sync/syncState";
import { decodeText, encodeFrame, type Frame } from "../protocol/frame";
import { FrameError, InvalidPayloadError, ListenError, PayloadTooLargeError } from "../protocol/errors";
import { BroadcastBus } from "./bus";
import { createConnection, type Connection, type PeerSocket } from "./connection";
import { ConnectionRegistry } from "./registry";
import { EventBus } from "./events";
import {
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_HOST,
  DEFAULT_INITIAL_READ_TIMEOUT_MS,
  DEFAULT_MAX_SEND_BACKLOG_BYTES,
  DEFAULT_PORT,
} from "./constants";
import { createLogger } from "../logger";

const log = createLogger("server");

export type DropReason = "closed" | "error" | "protocol" | "send-failed";

export type PeerConnectedEvent = { id: string; label: string; clients: number };
export type PeerDroppedEvent = PeerConnectedEvent & { reason: DropReason };
export type TextAppliedEvent = { from: string; text: string; ok: boolean };

export interface BridgeServerOptions {
  clipboard: ClipboardPort;
  host?: string;
  port?: number;
  pollIntervalMs?: number;
  readTimeoutMs?: number;
  initialReadTimeoutMs?: number;
  flushIntervalMs?: number;
  maxSendBacklogBytes?: number;
  /** Set false to run without polling the local clipboard. */
  watchClipboard?: boolean;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class BridgeServer {
  readonly state = new ClipboardSyncState();
  readonly bus = new BroadcastBus();

  private readonly registry = new ConnectionRegistry();
  private readonly clipboard: ClipboardPort;
  private readonly watcher: ClipboardWatcher;
  private readonly host: string;
  private readonly port: number;
  private readonly initialReadTimeoutMs: number;
  private readonly flushIntervalMs: number;
  private readonly maxSendBacklogBytes: number;
  private readonly watchClipboard: boolean;

  private server: net.Server | null = null;
  private flushTimer: ReturnType<typeof setInterval> | undefined;
  private flushScheduled = false;
  private stopped = false;
  private closing: Promise<void> | null = null;
  /** Clipboard reads and writes run one at a time, in arrival order. */
  private clipboardChain: Promise<void> = Promise.resolve();
  private readonly pendingPushes = new Set<Promise<void>>();

  private readonly connectBus = new EventBus<PeerConnectedEvent>();
  private readonly dropBus = new EventBus<PeerDroppedEvent>();
  private readonly appliedBus = new EventBus<TextAppliedEvent>();

  constructor(options: BridgeServerOptions) {
    this.clipboard = options.clipboard;
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.initialReadTimeoutMs = options.initialReadTimeoutMs ?? DEFAULT_INITIAL_READ_TIMEOUT_MS;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.maxSendBacklogBytes = options.maxSendBacklogBytes ?? DEFAULT_MAX_SEND_BACKLOG_BYTES;
    this.watchClipboard = options.watchClipboard ?? true;
    this.watcher = createClipboardWatcher({
      clipboard: this.clipboard,
      state: this.state,
      bus: this.bus,
      pollIntervalMs: options.pollIntervalMs,
      readTimeoutMs: options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS,
      exclusive: <T>(task: () => Promise<T>) => this.exclusive(task),
    });
    this.bus.onEnqueue(() => this.scheduleFlush());
  }

  get clientCount(): number {
    return this.registry.size;
  }

  clientIds(): string[] {
    return this.registry.snapshot();
  }

  async start(): Promise<AddressInfo> {
    if (this.server || this.stopped) throw new Error("BridgeServer cannot be started twice");
    const server = net.createServer((socket) => {
      this.attach(socket);
    });
    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
          server.off("listening", onListening);
          reject(err);
        };
        const onListening = () => {
          server.off("error", onError);
          resolve();
        };
        server.once("error", onError);
        server.once("listening", onListening);
        server.listen({ host: this.host, port: this.port });
      });
    } catch (err) {
      throw new ListenError(this.host, this.port, err);
    }
    server.on("error", (err) => {
      log.error("Listener error", { error: err.message });
    });
    this.server = server;

    this.flushTimer = setInterval(() => {
      this.flushPending();
    }, this.flushIntervalMs);
    if (this.watchClipboard) this.watcher.start();

    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error(`Unexpected listener address: ${String(address)}`);
    }
    log.info(`Server listening on ${address.address}:${address.port}`);
    return address;
  }

  /**
   * Take ownership of a freshly accepted socket and push the current
   * clipboard to it. Returns null once the server is shut down.
   */
  attach(socket: PeerSocket): Connection | null {
    if (this.stopped) {
      socket.destroy();
      return null;
    }
    socket.setNoDelay?.(true);
    const conn = createConnection(socket);
    socket.on("data", (chunk) => this.handleData(conn, chunk));
    socket.on("end", () => this.drop(conn.id, "closed"));
    socket.on("close", () => this.drop(conn.id, "closed"));
    socket.on("error", (err) => {
      log.info(`Socket error from ${conn.label}: ${err.message}`);
      this.drop(conn.id, "error");
    });
    this.registry.register(conn);
    log.info(`Client connected: ${conn.label} (clients=${this.registry.size})`);
    this.connectBus.emit({ id: conn.id, label: conn.label, clients: this.registry.size });

    const push = this.pushInitialClipboard(conn).catch((err) => {
      log.warn(`Initial clipboard push failed for ${conn.label}`, { error: describeError(err) });
    });
    this.pendingPushes.add(push);
    void push.finally(() => this.pendingPushes.delete(push));
    return conn;
  }

  /**
   * Write `payload` to every live peer except `excludeId`. Peers that cannot
   * take the write are dropped; the rest still receive it.
   */
  broadcast(payload: Uint8Array, excludeId?: string): number {
    let sent = 0;
    for (const id of this.registry.snapshot()) {
      if (id === excludeId) continue;
      const conn = this.registry.get(id);
      if (!conn) continue;
      if (this.sendTo(conn, payload)) sent++;
    }
    if (sent) log.debug(`Broadcasted frame to ${sent} client(s)`);
    return sent;
  }

  /** Send every queued local change to all peers. Returns frames flushed. */
  flushPending(): number {
    const frames = this.bus.drain();
    for (const frame of frames) this.broadcast(frame);
    if (frames.length) log.debug(`Flushed ${frames.length} queued frame(s)`);
    return frames.length;
  }

  /** One clipboard poll right now, outside the watcher's schedule. */
  pollClipboard(): Promise<TickOutcome> {
    return this.watcher.pollOnce();
  }

  /** Resolves once pending clipboard writes and initial pushes have finished. */
  async settled(): Promise<void> {
    await Promise.all([this.clipboardChain, ...this.pendingPushes]);
  }

  shutdown(): Promise<void> {
    if (!this.closing) this.closing = this.close();
    return this.closing;
  }

  onClientConnected(handler: (event: PeerConnectedEvent) => void): () => void {
    return this.connectBus.on(handler);
  }

  onClientDropped(handler: (event: PeerDroppedEvent) => void): () => void {
    return this.dropBus.on(handler);
  }

  onTextApplied(handler: (event: TextAppliedEvent) => void): () => void {
    return this.appliedBus.on(handler);
  }

  private async close(): Promise<void> {
    this.stopped = true;
    this.watcher.stop();
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = undefined;
    }
    const connections = this.registry.clear();
    for (const conn of connections) {
      conn.reader.reset();
      if (!conn.socket.destroyed) conn.socket.destroy();
    }
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close((err) => {
          if (err) log.debug("Listener already closed", { error: err.message });
          resolve();
        });
      });
    }
    log.info(`Shutdown complete, closed ${connections.length} client(s)`);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.clipboardChain.then(task);
    this.clipboardChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async pushInitialClipboard(conn: Connection): Promise<void> {
    const result = await this.exclusive(() => this.clipboard.readText(this.initialReadTimeoutMs));
    if (!result.ok || result.text === "") return;
    if (!this.registry.has(conn.id)) return;
    if (conn.primed) {
      log.debug(`Skipping initial push to ${conn.label}: newer text already sent`);
      return;
    }
    let frame: Uint8Array;
    try {
      frame = encodeFrame(result.text);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        log.warn(`Clipboard too large for initial push to ${conn.label}`, { bytes: err.size });
        return;
      }
      throw err;
    }
    if (this.sendTo(conn, frame)) {
      log.debug(`Pushed initial clipboard (${result.text.length} chars) to ${conn.label}`);
    }
  }

  private handleData(conn: Connection, chunk: Uint8Array): void {
    if (!this.registry.has(conn.id)) return;
    conn.reader.append(chunk);
    log.debug(`Received ${chunk.length} bytes from ${conn.label} (buffer=${conn.reader.pending})`);
    for (;;) {
      let frame: Frame | null;
      try {
        frame = conn.reader.next();
      } catch (err) {
        if (!(err instanceof FrameError)) throw err;
        log.warn(`Protocol error from ${conn.label}: ${err.message}`);
        this.drop(conn.id, "protocol");
        return;
      }
      if (!frame) return;

      let text: string;
      try {
        text = decodeText(frame);
      } catch (err) {
        if (!(err instanceof InvalidPayloadError)) throw err;
        log.warn(`UTF-8 decode failed from ${conn.label}`);
        continue;
      }
      this.applyFromPeer(conn, frame, text);
    }
  }

  private applyFromPeer(conn: Connection, frame: Frame, text: string): void {
    void this.exclusive(async () => {
      // Recorded right before the write so the watcher does not echo it back out.
      this.state.recordPeerText(text);
      const ok = await this.clipboard.writeText(text);
      log.info(`Applied text from client (${frame.payload.length} bytes, ok=${ok})`);
      this.appliedBus.emit({ from: conn.id, text, ok });
    }).catch((err) => {
      log.warn("Clipboard write failed", { error: describeError(err) });
    });
    this.broadcast(frame.raw, conn.id);
  }

  private sendTo(conn: Connection, payload: Uint8Array): boolean {
    if (conn.socket.destroyed) {
      log.info(`Send to closed socket -> dropping ${conn.label}`);
      this.drop(conn.id, "send-failed");
      return false;
    }
    try {
      conn.socket.write(payload);
    } catch (err) {
      log.info(`Send failed -> dropping ${conn.label}: ${describeError(err)}`);
      this.drop(conn.id, "send-failed");
      return false;
    }
    if (conn.socket.writableLength > this.maxSendBacklogBytes) {
      log.info(`Send backlog exceeded -> dropping ${conn.label}`);
      this.drop(conn.id, "send-failed");
      return false;
    }
    conn.primed = true;
    return true;
  }

  private drop(id: string, reason: DropReason): void {
    const conn = this.registry.unregister(id);
    if (!conn) return;
    conn.reader.reset();
    if (!conn.socket.destroyed) conn.socket.destroy();
    log.info(`Client dropped: ${conn.label} (clients=${this.registry.size}, reason=${reason})`);
    this.dropBus.emit({ id: conn.id, label: conn.label, clients: this.registry.size, reason });
  }

  private scheduleFlush(): void {
    if (this.flushScheduled || this.stopped) return;
    this.flushScheduled = true;
    setImmediate(() => {
      this.flushScheduled = false;
      if (!this.stopped) this.flushPending();
    });
  }
}
