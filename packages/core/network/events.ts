/**
 * Typed listener list for server and client lifecycle events.
 */
type Handler<T> = (payload: T) => void;

export class EventBus<T> {
  private handlers: Handler<T>[] = [];

  on(handler: Handler<T>): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  emit(payload: T) {
    for (const h of [...this.handlers]) h(payload);
  }
}
