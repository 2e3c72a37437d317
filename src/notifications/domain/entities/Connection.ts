export type ConnectionId = string;

export interface Connection {
  readonly id: ConnectionId;
  readonly userId: string;
  readonly connectedAt: Date;
  send(message: string): Promise<void>;
  close(): void;
}
