export * from "./protocol/frame";
export * from "./protocol/errors";
export type { ClipboardPort, ClipboardReadResult } from "./clipboard/port";
export * from "./clipboard/commandPort";
export * from "./clipboard/watcher";
export { ClipboardSyncState } from "./sync/syncState";
export { BroadcastBus } from "./network/bus";
export { ConnectionRegistry } from "./network/registry";
export * from "./network/connection";
export * from "./network/constants";
export * from "./network/server";
export * from "./network/client";
export * from "./config";
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from "./logger";
