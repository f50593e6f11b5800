/**
 * FIFO of encoded frames waiting to go out to every peer. The watcher
 * enqueues; the server drains it to empty on each flush.
 */
export class BroadcastBus {
  private queue: Uint8Array[] = [];
  private listeners: Array<() => void> = [];

  get size(): number {
    return this.queue.length;
  }

  enqueue(frame: Uint8Array): void {
    this.queue.push(frame);
    for (const listener of this.listeners) listener();
  }

  /** Everything queued so far, oldest first. The queue is left empty. */
  drain(): Uint8Array[] {
    const frames = this.queue;
    this.queue = [];
    return frames;
  }

  /** Called after every enqueue. */
  onEnqueue(listener: () => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }
}
