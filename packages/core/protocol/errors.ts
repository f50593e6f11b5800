/**
 * Error types raised by the bridge.
 *
 * Frame errors are fatal to the connection that produced them; payload errors
 * only discard the offending frame.
 */

export class ClipBridgeError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class FrameError extends ClipBridgeError {}

export class PayloadTooLargeError extends FrameError {
  constructor(
    readonly size: number,
    readonly limit: number
  ) {
    super("PAYLOAD_TOO_LARGE", `payload of ${size} bytes exceeds limit of ${limit}`);
  }
}

export class BadFrameTypeError extends FrameError {
  constructor(readonly frameType: number) {
    super("BAD_FRAME_TYPE", `unexpected frame type 0x${frameType.toString(16).padStart(2, "0")}`);
  }
}

export class BadFrameLengthError extends FrameError {
  constructor(
    readonly length: number,
    readonly limit: number
  ) {
    super("BAD_FRAME_LENGTH", `frame length ${length} exceeds limit of ${limit}`);
  }
}

export class InvalidPayloadError extends ClipBridgeError {
  constructor(cause?: unknown) {
    super("INVALID_PAYLOAD", "frame payload is not valid UTF-8");
    if (cause !== undefined) this.cause = cause;
  }
}

export class ListenError extends ClipBridgeError {
  constructor(
    readonly host: string,
    readonly port: number,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("LISTEN_FAILED", `cannot listen on ${host}:${port}: ${reason}`);
    this.cause = cause;
  }
}
