import { EventEmitter } from "node:events";
import {
  createBridgeClient,
  type ClientSocket,
  type ClientStatus,
} from "../../../packages/core/network/client";
import { encodeFrame } from "../../../packages/core/protocol/frame";
import type { ClipboardPort } from "../../../packages/core/clipboard/port";
import { createFakeClipboard } from "../../harness/fakeSocket";

class FakeClientSocket extends EventEmitter implements ClientSocket {
  destroyed = false;
  readonly written: Buffer[] = [];

  write(data: Uint8Array): boolean {
    this.written.push(Buffer.from(data));
    return true;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.emit("close", false);
  }
}

function harness(options: { autoReconnect?: boolean; clipboard?: ClipboardPort } = {}) {
  const sockets: FakeClientSocket[] = [];
  const dials: string[] = [];
  const client = createBridgeClient({
    host: "10.0.0.5",
    port: 28900,
    autoReconnect: options.autoReconnect,
    retryDelayMs: 3000,
    connectTimeoutMs: 5000,
    clipboard: options.clipboard,
    openSocket: (host, port) => {
      dials.push(`${host}:${port}`);
      const socket = new FakeClientSocket();
      sockets.push(socket);
      return socket;
    },
  });
  const statuses: ClientStatus[] = [];
  const texts: string[] = [];
  client.onStatus((e) => statuses.push(e.status));
  client.onText((t) => texts.push(t));
  return { client, sockets, dials, statuses, texts };
}

describe("BridgeClient", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });
  afterEach(() => {
    jest.useRealTimers();
  });

  it("connects and reports status", () => {
    const h = harness();
    h.client.start();
    expect(h.dials).toEqual(["10.0.0.5:28900"]);
    expect(h.client.status()).toBe("connecting");
    h.sockets[0].emit("connect");
    expect(h.statuses).toEqual(["connecting", "connected"]);
  });

  it("delivers text from frames split across reads", () => {
    const h = harness();
    h.client.start();
    h.sockets[0].emit("connect");
    const stream = Buffer.concat([encodeFrame("hello"), encodeFrame("again")]);
    h.sockets[0].emit("data", stream.subarray(0, 7));
    expect(h.texts).toEqual([]);
    h.sockets[0].emit("data", stream.subarray(7));
    expect(h.texts).toEqual(["hello", "again"]);
  });

  it("writes every received text to the clipboard in order", async () => {
    const clip = createFakeClipboard("before");
    const h = harness({ clipboard: clip.port });
    h.client.start();
    h.sockets[0].emit("connect");
    h.sockets[0].emit("data", Buffer.concat([encodeFrame("first"), encodeFrame("second")]));
    await h.client.settled();
    expect(clip.writes).toEqual(["first", "second"]);
    expect(clip.get()).toBe("second");
    expect(h.texts).toEqual(["first", "second"]);
  });

  it("skips undecodable text without touching the clipboard", async () => {
    const clip = createFakeClipboard("before");
    const h = harness({ clipboard: clip.port });
    h.client.start();
    h.sockets[0].emit("connect");
    h.sockets[0].emit("data", Buffer.concat([Buffer.from([0x01, 0, 0, 0, 1, 0xff]), encodeFrame("ok")]));
    await h.client.settled();
    expect(clip.writes).toEqual(["ok"]);
    expect(h.sockets[0].destroyed).toBe(false);
  });

  it("keeps delivering after a clipboard write rejects", async () => {
    const writes: string[] = [];
    const clipboard: ClipboardPort = {
      readText: async () => ({ ok: false }),
      writeText: async (text) => {
        writes.push(text);
        if (text === "bad") throw new Error("tool crashed");
        return true;
      },
    };
    const h = harness({ clipboard });
    h.client.start();
    h.sockets[0].emit("connect");
    h.sockets[0].emit("data", Buffer.concat([encodeFrame("bad"), encodeFrame("good")]));
    await h.client.settled();
    expect(writes).toEqual(["bad", "good"]);
  });

  it("sends framed text only while connected", () => {
    const h = harness();
    h.client.start();
    expect(h.client.send("early")).toBe(false);
    h.sockets[0].emit("connect");
    expect(h.client.send("hi")).toBe(true);
    expect(h.sockets[0].written).toEqual([Buffer.from([0x01, 0, 0, 0, 2, 0x68, 0x69])]);
  });

  it("closes the link on a protocol error", () => {
    const h = harness();
    h.client.start();
    h.sockets[0].emit("connect");
    h.sockets[0].emit("data", Buffer.from([0x05, 0, 0, 0, 0]));
    expect(h.sockets[0].destroyed).toBe(true);
    expect(h.client.status()).toBe("disconnected");
  });

  it("stays disconnected after a drop without auto-reconnect", () => {
    const h = harness();
    h.client.start();
    h.sockets[0].emit("connect");
    h.sockets[0].emit("close", false);
    jest.advanceTimersByTime(10_000);
    expect(h.dials).toHaveLength(1);
    expect(h.statuses).toEqual(["connecting", "connected", "disconnected"]);
  });

  it("retries after the delay with auto-reconnect", () => {
    const h = harness({ autoReconnect: true });
    h.client.start();
    h.sockets[0].emit("error", new Error("ECONNREFUSED"));
    h.sockets[0].emit("close", true);
    expect(h.client.status()).toBe("waiting");
    jest.advanceTimersByTime(2999);
    expect(h.dials).toHaveLength(1);
    jest.advanceTimersByTime(1);
    expect(h.dials).toHaveLength(2);
    h.sockets[1].emit("connect");
    expect(h.statuses).toEqual(["connecting", "waiting", "connecting", "connected"]);
    h.client.stop();
  });

  it("gives up on a connect attempt that hangs", () => {
    const h = harness();
    h.client.start();
    jest.advanceTimersByTime(5000);
    expect(h.sockets[0].destroyed).toBe(true);
    expect(h.client.status()).toBe("disconnected");
  });

  it("stop cancels a pending retry", () => {
    const h = harness({ autoReconnect: true });
    h.client.start();
    h.sockets[0].emit("close", true);
    h.client.stop();
    jest.advanceTimersByTime(10_000);
    expect(h.dials).toHaveLength(1);
    expect(h.client.status()).toBe("disconnected");
  });
});
