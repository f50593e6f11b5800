/**
 * What the bridge needs from the OS clipboard. Implementations must resolve,
 * never reject, and must not outlast the timeouts they are given.
 */
export type ClipboardReadResult = { ok: true; text: string } | { ok: false };

export interface ClipboardPort {
  /** `ok: true` with an empty string is a valid, empty clipboard. */
  readText(timeoutMs: number): Promise<ClipboardReadResult>;
  /** Resolves false when no backend accepted the text. */
  writeText(text: string): Promise<boolean>;
}
