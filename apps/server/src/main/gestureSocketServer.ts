import { randomUUID } from "node:crypto";
import http from "node:http";
import type { AddressInfo } from "node:net";
import { type GestureConfig, SessionRegistry } from "@facecue/gesture-core";
import { type RawData, type WebSocket, WebSocketServer } from "ws";
import { WEBSOCKET_PATH } from "../shared/protocol";
import { type Logger, getLogger, toErrorPayload } from "../shared/logger";
import type { ServerMessage } from "../shared/types/messages";
import { type ErrorReporter, GestureSession } from "./gestureSession";
import { createHttpRequestHandler } from "./httpRoutes";
import {
  type LandmarkExtractor,
  UnavailableLandmarkExtractor,
} from "./landmarkExtractor";

export type GestureSocketServerOptions = {
  host: string;
  port: number;
  config: GestureConfig;
  extractor?: LandmarkExtractor;
  reportError?: ErrorReporter;
  logger?: Logger;
};

export const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
};

const hasErrorCode = (error: unknown): error is Error & { code: string } => {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  );
};

/**
 * HTTP + WebSocket front door. Each socket on `/ws` gets its own
 * GestureSession; the HTTP side answers health and threshold queries.
 */
export class GestureSocketServer {
  private readonly registry: SessionRegistry;

  private readonly extractor: LandmarkExtractor;

  private readonly httpServer: http.Server;

  private readonly wss: WebSocketServer;

  private readonly sessions = new Map<WebSocket, GestureSession>();

  private readonly logger: Logger;

  constructor(private readonly options: GestureSocketServerOptions) {
    this.logger = options.logger ?? getLogger("gesture-server");
    this.extractor = options.extractor ?? new UnavailableLandmarkExtractor();
    this.registry = new SessionRegistry({
      config: options.config,
      onGesture: (sessionId, event) => {
        this.logger.info("Gesture detected", {
          sessionId,
          gesture: event.type,
          timestamp: event.timestamp,
          debug: event.debug,
        });
      },
    });

    this.httpServer = http.createServer(
      createHttpRequestHandler({
        getSessionCount: () => this.registry.size,
        getConfig: () => this.registry.getConfig(),
      }),
    );
    this.wss = new WebSocketServer({
      server: this.httpServer,
      path: WEBSOCKET_PATH,
    });
    this.wss.on("connection", (socket) => {
      this.handleConnection(socket);
    });
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  listen(): Promise<AddressInfo> {
    const { host, port } = this.options;

    return new Promise((resolve, reject) => {
      const onError = (error: unknown) => {
        if (hasErrorCode(error) && error.code === "EADDRINUSE") {
          this.logger.error("Gesture server port already in use", { host, port });
        } else {
          this.logger.error(
            "Gesture server encountered an error",
            toErrorPayload(error),
          );
        }
        reject(error);
      };

      this.httpServer.once("error", onError);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off("error", onError);
        const address = this.httpServer.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Gesture server did not bind to a TCP address"));
          return;
        }
        this.logger.info("Gesture server listening", {
          host: address.address,
          port: address.port,
          websocketPath: WEBSOCKET_PATH,
          extractor: this.extractor.name,
        });
        resolve(address);
      });
    });
  }

  async close(): Promise<void> {
    for (const [socket, session] of this.sessions) {
      session.close();
      socket.close(1001, "Server shutting down");
    }
    this.sessions.clear();
    this.registry.closeAll();

    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
    });
    await this.extractor.close?.();

    this.logger.info("Gesture server stopped");
  }

  private handleConnection(socket: WebSocket): void {
    const session = new GestureSession({
      sessionId: randomUUID(),
      registry: this.registry,
      extractor: this.extractor,
      reportError: this.options.reportError,
      send: (message) => {
        this.sendTo(socket, message);
      },
    });
    this.sessions.set(socket, session);
    this.logger.info("Client connected", {
      sessionId: session.sessionId,
      sessions: this.registry.size,
    });

    socket.on("message", (data) => {
      void session.enqueue(rawDataToString(data));
    });

    socket.on("close", (code) => {
      session.close();
      this.sessions.delete(socket);
      this.logger.info("Client disconnected", {
        sessionId: session.sessionId,
        code,
        sessions: this.registry.size,
      });
    });

    socket.on("error", (error) => {
      this.logger.warn("Client socket error", {
        sessionId: session.sessionId,
        ...toErrorPayload(error),
      });
    });

    session.start();
  }

  private sendTo(socket: WebSocket, message: ServerMessage): void {
    if (socket.readyState !== socket.OPEN) {
      return;
    }
    socket.send(JSON.stringify(message));
  }
}
