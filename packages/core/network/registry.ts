import type { Connection } from "./connection";

/**
 * Live peer connections keyed by id. A connection in the registry has its
 * socket listeners attached; removing it here is the first step of a drop.
 * Callers take a `snapshot` before doing socket I/O over the set.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();

  get size(): number {
    return this.connections.size;
  }

  register(connection: Connection): void {
    this.connections.set(connection.id, connection);
  }

  unregister(id: string): Connection | undefined {
    const connection = this.connections.get(id);
    if (!connection) return undefined;
    this.connections.delete(id);
    return connection;
  }

  get(id: string): Connection | undefined {
    return this.connections.get(id);
  }

  has(id: string): boolean {
    return this.connections.has(id);
  }

  snapshot(): string[] {
    return Array.from(this.connections.keys());
  }

  /** Empties the registry and hands back what was in it. */
  clear(): Connection[] {
    const all = Array.from(this.connections.values());
    this.connections.clear();
    return all;
  }
}
