import type { ClipboardPort } from "./port";
import type { BroadcastBus } from "../network/bus";
import type { ClipboardSyncState } from "../sync/syncState";
import { encodeFrame, HEADER_BYTES } from "../protocol/frame";
import { PayloadTooLargeError } from "../protocol/errors";
import { createLogger } from "../logger";

const log = createLogger("watcher");

export const MIN_POLL_INTERVAL_MS = 50;
export const DEFAULT_POLL_INTERVAL_MS = 300;
export const DEFAULT_READ_TIMEOUT_MS = 1000;

export type TickOutcome = "queued" | "unchanged" | "read-failed" | "skipped";

export interface ClipboardWatcher {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  /** One poll. Exposed for callers that drive the clock themselves. */
  pollOnce(): Promise<TickOutcome>;
}

/** Runs `task` with no clipboard write in flight. */
export type ExclusiveRunner = <T>(task: () => Promise<T>) => Promise<T>;

export type ClipboardWatcherOptions = {
  clipboard: ClipboardPort;
  state: ClipboardSyncState;
  bus: BroadcastBus;
  pollIntervalMs?: number;
  readTimeoutMs?: number;
  /** Serializes each read and its comparison against pending writes. */
  exclusive?: ExclusiveRunner;
};

const runDirectly: ExclusiveRunner = (task) => task();

export function clampPollInterval(ms: number | undefined): number {
  if (ms === undefined || !Number.isFinite(ms)) return DEFAULT_POLL_INTERVAL_MS;
  return Math.max(MIN_POLL_INTERVAL_MS, Math.floor(ms));
}

/**
 * Polls the clipboard and queues a frame for every local change. A poll
 * starts only after the previous one has finished, so slow reads never
 * overlap.
 */
export function createClipboardWatcher(options: ClipboardWatcherOptions): ClipboardWatcher {
  const { clipboard, state, bus } = options;
  const intervalMs = clampPollInterval(options.pollIntervalMs);
  const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  const exclusive = options.exclusive ?? runDirectly;

  let running = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  async function pollOnce(): Promise<TickOutcome> {
    const { result, fresh } = await exclusive(async () => {
      const read = await clipboard.readText(readTimeoutMs);
      return { result: read, fresh: read.ok && state.recordLocalRead(read.text) };
    });
    if (!result.ok) {
      log.debug("Clipboard read returned not-ok");
      return "read-failed";
    }
    if (!fresh) return "unchanged";
    const text = result.text;
    let frame: Uint8Array;
    try {
      frame = encodeFrame(text);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        log.warn("Local clipboard change too large to send", { bytes: err.size });
        return "skipped";
      }
      throw err;
    }
    bus.enqueue(frame);
    log.info("Queued local clipboard change", { bytes: frame.length - HEADER_BYTES });
    return "queued";
  }

  async function tick() {
    if (!running) return;
    try {
      await pollOnce();
    } catch (err) {
      log.warn("Clipboard poll failed", { error: err instanceof Error ? err.message : String(err) });
    }
    if (running) timer = setTimeout(() => void tick(), intervalMs);
  }

  return {
    start() {
      if (running) return;
      running = true;
      log.info(`Clipboard watcher started (poll=${intervalMs}ms)`);
      void tick();
    },
    stop() {
      if (!running) return;
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      log.info("Clipboard watcher stopped");
    },
    isRunning() {
      return running;
    },
    pollOnce,
  };
}
