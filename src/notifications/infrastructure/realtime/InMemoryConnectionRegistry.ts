import { Connection } from "../../domain/entities/Connection";
import { ConnectionRegistry } from "../../domain/repositories/ConnectionRegistry";
import { Metrics } from "../../../shared/observability/metrics";

/**
 * Process-local registry of live sockets keyed by user id.
 *
 * Every method is synchronous, so on the event loop each call completes
 * before any other socket or consumer callback runs and no reader can see a
 * partially updated set.
 */
export class InMemoryConnectionRegistry implements ConnectionRegistry {
  private readonly connectionsByUser = new Map<string, Set<Connection>>();
  private total = 0;

  constructor(private readonly metrics?: Pick<Metrics, "setWebSocketConnections">) {}

  register(userId: string, connection: Connection): void {
    let connections = this.connectionsByUser.get(userId);
    if (!connections) {
      connections = new Set();
      this.connectionsByUser.set(userId, connections);
    }
    if (connections.has(connection)) {
      return;
    }
    connections.add(connection);
    this.total += 1;
    this.metrics?.setWebSocketConnections(this.total);
  }

  unregister(userId: string, connection: Connection): void {
    const connections = this.connectionsByUser.get(userId);
    if (!connections || !connections.delete(connection)) {
      return;
    }
    if (connections.size === 0) {
      this.connectionsByUser.delete(userId);
    }
    this.total -= 1;
    this.metrics?.setWebSocketConnections(this.total);
  }

  connectionsFor(userId: string): Connection[] {
    return Array.from(this.connectionsByUser.get(userId) ?? []);
  }

  size(): number {
    return this.total;
  }
}
