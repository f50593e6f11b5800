import { v4 as uuidv4 } from "uuid";
import { FrameReader } from "../protocol/frame";

/**
 * The slice of `net.Socket` the server relies on. Kept narrow so tests can
 * drive the server with in-memory sockets.
 */
export interface PeerSocket {
  readonly remoteAddress?: string;
  readonly remotePort?: number;
  readonly writableLength: number;
  readonly destroyed: boolean;
  write(data: Uint8Array): boolean;
  destroy(): void;
  setNoDelay?(noDelay?: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "end", listener: () => void): unknown;
  on(event: "close", listener: (hadError: boolean) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface Connection {
  readonly id: string;
  readonly socket: PeerSocket;
  /** `address:port` of the peer, for logs. */
  readonly label: string;
  readonly reader: FrameReader;
  readonly connectedAt: number;
  /** Set once any frame has been written to the peer. */
  primed: boolean;
}

export function describePeer(socket: PeerSocket): string {
  const address = socket.remoteAddress ?? "unknown";
  return socket.remotePort !== undefined ? `${address}:${socket.remotePort}` : address;
}

export function createConnection(
  socket: PeerSocket,
  deps: { now?: () => number; makeId?: () => string } = {}
): Connection {
  const now = deps.now ?? Date.now;
  const makeId = deps.makeId ?? uuidv4;
  return {
    id: makeId(),
    socket,
    label: describePeer(socket),
    reader: new FrameReader(),
    connectedAt: now(),
    primed: false,
  };
}
