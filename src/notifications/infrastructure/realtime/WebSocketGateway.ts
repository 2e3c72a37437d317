import { IncomingMessage, Server as HttpServer, STATUS_CODES } from "http";
import { Duplex } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import { WebSocketConnection } from "./WebSocketConnection";
import { ConnectionRegistry } from "../../domain/repositories/ConnectionRegistry";
import { verifyAccessToken } from "../../../shared/http/authMiddleware";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";

export type WebSocketGatewayConfig = {
  jwtKey: string;
};

type UpgradeDecision =
  | { accepted: true; userId: string }
  | { accepted: false; statusCode: 401 | 404; reason: string };

const SOCKET_PATH = /^\/ws\/([^/]+)$/;

const rejectUpgrade = (socket: Duplex, statusCode: number): void => {
  socket.once("finish", () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${statusCode} ${STATUS_CODES[statusCode] ?? ""}\r\n` +
      "Connection: close\r\n" +
      "Content-Length: 0\r\n" +
      "\r\n"
  );
};

const decodeUserId = (raw: string): string | null => {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
};

/**
 * Accepts `GET /ws/:userId?token=<access token>` upgrades and keeps the
 * registry in step with the sockets' lifecycles. Messages sent by clients
 * are ignored.
 */
export class WebSocketGateway {
  private readonly server = new WebSocketServer({ noServer: true });

  constructor(
    private readonly config: WebSocketGatewayConfig,
    private readonly registry: ConnectionRegistry,
    private readonly metrics: Pick<Metrics, "recordAuthFailure">,
    private readonly logger: Logger
  ) {}

  attach(httpServer: HttpServer): void {
    httpServer.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
  }

  async close(): Promise<void> {
    for (const client of this.server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const decision = this.authorize(req);
    if (!decision.accepted) {
      this.logger.warn("WebSocket upgrade rejected", {
        statusCode: decision.statusCode,
        reason: decision.reason
      });
      rejectUpgrade(socket, decision.statusCode);
      return;
    }
    this.server.handleUpgrade(req, socket, head, (ws) => {
      this.onConnection(ws, decision.userId);
    });
  }

  private authorize(req: IncomingMessage): UpgradeDecision {
    const url = new URL(req.url ?? "/", "http://localhost");
    const match = SOCKET_PATH.exec(url.pathname);
    const userId = match ? decodeUserId(match[1]) : null;
    if (!userId) {
      return { accepted: false, statusCode: 404, reason: "unknown_path" };
    }

    const header = req.headers.authorization ?? "";
    const token =
      url.searchParams.get("token") ?? (header.startsWith("Bearer ") ? header.slice(7) : "");
    if (!token) {
      this.metrics.recordAuthFailure("ws_missing_token");
      return { accepted: false, statusCode: 401, reason: "missing_token" };
    }

    try {
      const claims = verifyAccessToken(token, this.config.jwtKey);
      if (!claims || claims.userId !== userId) {
        this.metrics.recordAuthFailure("ws_subject_mismatch");
        return { accepted: false, statusCode: 401, reason: "subject_mismatch" };
      }
    } catch {
      this.metrics.recordAuthFailure("ws_invalid_token");
      return { accepted: false, statusCode: 401, reason: "invalid_token" };
    }
    return { accepted: true, userId };
  }

  private onConnection(ws: WebSocket, userId: string): void {
    const connection = new WebSocketConnection(userId, ws);
    this.registry.register(userId, connection);
    this.logger.info("WebSocket connected", { userId, connectionId: connection.id });

    ws.on("close", () => {
      this.registry.unregister(userId, connection);
      this.logger.info("WebSocket disconnected", { userId, connectionId: connection.id });
    });
    ws.on("error", (error) => {
      this.registry.unregister(userId, connection);
      this.logger.warn("WebSocket error", {
        userId,
        connectionId: connection.id,
        error: error.message
      });
    });
  }
}
