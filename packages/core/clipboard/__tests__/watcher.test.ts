import { jest } from "@jest/globals";
import { clampPollInterval, createClipboardWatcher } from "../watcher";
import type { ClipboardPort, ClipboardReadResult } from "../port";
import { BroadcastBus } from "../../network/bus";
import { ClipboardSyncState } from "../../sync/syncState";
import { decodeText, encodeFrame, MAX_PAYLOAD, tryDecodeFrame } from "../../protocol/frame";
import { createFakeClipboard, flushPromises } from "../../../../tests/harness/fakeSocket";

function textsOf(frames: Uint8Array[]): string[] {
  return frames.map((f) => {
    const { frame } = tryDecodeFrame(f);
    if (!frame) throw new Error("incomplete frame");
    return decodeText(frame);
  });
}

describe("clampPollInterval", () => {
  test("floors at 50ms", () => {
    expect(clampPollInterval(10)).toBe(50);
    expect(clampPollInterval(50)).toBe(50);
  });

  test("defaults to 300ms", () => {
    expect(clampPollInterval(undefined)).toBe(300);
    expect(clampPollInterval(Number.NaN)).toBe(300);
  });

  test("drops fractions", () => {
    expect(clampPollInterval(75.9)).toBe(75);
  });
});

describe("ClipboardWatcher.pollOnce", () => {
  let bus: BroadcastBus;
  let state: ClipboardSyncState;

  beforeEach(() => {
    bus = new BroadcastBus();
    state = new ClipboardSyncState();
  });

  test("queues the first non-empty read", async () => {
    const clip = createFakeClipboard("first");
    const watcher = createClipboardWatcher({ clipboard: clip.port, state, bus });
    await expect(watcher.pollOnce()).resolves.toBe("queued");
    expect(bus.drain()).toEqual([encodeFrame("first")]);
  });

  test("ignores a repeated value", async () => {
    const clip = createFakeClipboard("same");
    const watcher = createClipboardWatcher({ clipboard: clip.port, state, bus });
    await watcher.pollOnce();
    bus.drain();
    await expect(watcher.pollOnce()).resolves.toBe("unchanged");
    expect(bus.size).toBe(0);
  });

  test("does not queue an empty clipboard", async () => {
    const clip = createFakeClipboard("");
    const watcher = createClipboardWatcher({ clipboard: clip.port, state, bus });
    await expect(watcher.pollOnce()).resolves.toBe("unchanged");
    expect(state.snapshot().lastObserved).toBe("");
  });

  test("skips a failed read without touching state", async () => {
    const clip = createFakeClipboard("x");
    clip.setReadable(false);
    const watcher = createClipboardWatcher({ clipboard: clip.port, state, bus });
    await expect(watcher.pollOnce()).resolves.toBe("read-failed");
    expect(state.snapshot()).toEqual({ lastObserved: undefined, lastAppliedFromPeer: undefined });
    expect(bus.size).toBe(0);
  });

  test("skips text too large to frame but remembers it", async () => {
    const big = "a".repeat(MAX_PAYLOAD + 1);
    const clip = createFakeClipboard(big);
    const watcher = createClipboardWatcher({ clipboard: clip.port, state, bus });
    jest.spyOn(console, "warn").mockImplementation(() => {});
    await expect(watcher.pollOnce()).resolves.toBe("skipped");
    expect(bus.size).toBe(0);
    expect(state.snapshot().lastObserved).toBe(big);
    await expect(watcher.pollOnce()).resolves.toBe("unchanged");
    jest.restoreAllMocks();
  });

  test("passes the read timeout to the clipboard", async () => {
    const readText = jest.fn(async (_timeoutMs: number): Promise<ClipboardReadResult> => ({ ok: true, text: "t" }));
    const port: ClipboardPort = { readText, writeText: async () => true };
    const watcher = createClipboardWatcher({ clipboard: port, state, bus, readTimeoutMs: 750 });
    await watcher.pollOnce();
    expect(readText).toHaveBeenCalledWith(750);
  });

  test("reads and compares inside the exclusive runner", async () => {
    const clip = createFakeClipboard("inside");
    const events: string[] = [];
    const watcher = createClipboardWatcher({
      clipboard: clip.port,
      state,
      bus,
      exclusive: async (task) => {
        events.push("enter");
        const value = await task();
        events.push(`leave observed=${state.snapshot().lastObserved}`);
        return value;
      },
    });
    await expect(watcher.pollOnce()).resolves.toBe("queued");
    expect(events).toEqual(["enter", "leave observed=inside"]);
    expect(clip.reads()).toBe(1);
    expect(textsOf(bus.drain())).toEqual(["inside"]);
  });
});

describe("ClipboardWatcher loop", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });
  afterEach(() => {
    jest.useRealTimers();
  });

  test("picks up a change on the next tick", async () => {
    const clip = createFakeClipboard("a");
    const bus = new BroadcastBus();
    const watcher = createClipboardWatcher({
      clipboard: clip.port,
      state: new ClipboardSyncState(),
      bus,
      pollIntervalMs: 300,
    });
    watcher.start();
    await flushPromises();
    expect(textsOf(bus.drain())).toEqual(["a"]);

    clip.set("b");
    await jest.advanceTimersByTimeAsync(299);
    await flushPromises();
    expect(bus.size).toBe(0);

    await jest.advanceTimersByTimeAsync(1);
    await flushPromises();
    expect(textsOf(bus.drain())).toEqual(["b"]);

    await jest.advanceTimersByTimeAsync(900);
    await flushPromises();
    expect(bus.size).toBe(0);
    watcher.stop();
  });

  test("stop halts polling", async () => {
    const clip = createFakeClipboard("a");
    const watcher = createClipboardWatcher({
      clipboard: clip.port,
      state: new ClipboardSyncState(),
      bus: new BroadcastBus(),
      pollIntervalMs: 100,
    });
    watcher.start();
    await flushPromises();
    expect(watcher.isRunning()).toBe(true);
    watcher.stop();
    const reads = clip.reads();
    await jest.advanceTimersByTimeAsync(1000);
    await flushPromises();
    expect(clip.reads()).toBe(reads);
    expect(watcher.isRunning()).toBe(false);
  });

  test("keeps polling after a read rejects", async () => {
    let calls = 0;
    const port: ClipboardPort = {
      async readText(): Promise<ClipboardReadResult> {
        calls++;
        if (calls === 1) throw new Error("backend crashed");
        return { ok: true, text: "recovered" };
      },
      writeText: async () => true,
    };
    const bus = new BroadcastBus();
    jest.spyOn(console, "warn").mockImplementation(() => {});
    const watcher = createClipboardWatcher({ clipboard: port, state: new ClipboardSyncState(), bus, pollIntervalMs: 50 });
    watcher.start();
    await flushPromises();
    expect(bus.size).toBe(0);
    await jest.advanceTimersByTimeAsync(50);
    await flushPromises();
    expect(textsOf(bus.drain())).toEqual(["recovered"]);
    watcher.stop();
    jest.restoreAllMocks();
  });
});
