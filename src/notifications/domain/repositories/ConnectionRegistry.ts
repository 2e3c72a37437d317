import { Connection } from "../entities/Connection";

export interface ConnectionRegistry {
  register(userId: string, connection: Connection): void;
  unregister(userId: string, connection: Connection): void;
  /** Snapshot of the user's live connections; empty for unknown users. */
  connectionsFor(userId: string): Connection[];
  size(): number;
}
