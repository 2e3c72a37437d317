import { randomUUID } from "crypto";
import WebSocket from "ws";
import { Connection } from "../../domain/entities/Connection";

/** The part of a `ws` socket a connection needs. */
export type SocketTransport = {
  readonly readyState: number;
  send(data: string, callback: (error?: Error) => void): void;
  terminate(): void;
};

export class WebSocketConnection implements Connection {
  readonly id = randomUUID();
  readonly connectedAt = new Date();

  constructor(
    public readonly userId: string,
    private readonly socket: SocketTransport
  ) {}

  send(message: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("WebSocket is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(message, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    if (this.socket.readyState !== WebSocket.CLOSED) {
      this.socket.terminate();
    }
  }
}
