/**
 * Single-slot memory used to keep peer-applied text from being picked up by
 * the watcher and sent out again as a local change.
 */
export class ClipboardSyncState {
  private lastObserved: string | undefined;
  private lastAppliedFromPeer: string | undefined;

  /**
   * Record a clipboard read. Returns true when `text` is a genuine local
   * change that should be broadcast.
   */
  recordLocalRead(text: string): boolean {
    const changed = this.lastObserved === undefined || text !== this.lastObserved;
    const fresh = changed && text !== this.lastAppliedFromPeer && text !== "";
    if (fresh) this.lastAppliedFromPeer = text;
    this.lastObserved = text;
    return fresh;
  }

  /** Must be called before the peer's text is written to the clipboard. */
  recordPeerText(text: string): void {
    this.lastAppliedFromPeer = text;
  }

  snapshot(): { lastObserved?: string; lastAppliedFromPeer?: string } {
    return {
      lastObserved: this.lastObserved,
      lastAppliedFromPeer: this.lastAppliedFromPeer,
    };
  }
}
