// Endpoint defaults shared by the server, the client and the CLI.
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 28_900;

// Upper bound between two flushes of the broadcast queue when no socket is active.
export const DEFAULT_FLUSH_INTERVAL_MS = 1000;
export const DEFAULT_INITIAL_READ_TIMEOUT_MS = 500;

// A peer whose unsent backlog grows past this is treated as unwritable.
export const DEFAULT_MAX_SEND_BACKLOG_BYTES = 8 * 1024 * 1024;

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_RETRY_DELAY_MS = 3000;
