import type { ServerConfig } from "../config/server-config.js";
import { HttpRequestParseError, TransportError } from "../http/errors.js";
import {
  createHttpRequestParser,
  type HttpRequestStreamParser,
} from "../http/request-parser.js";
import {
  buildErrorResponse,
  type ResponseContext,
} from "../http/response-builder.js";
import { writeResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileHandle } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import type { StaticServer } from "./static-server.js";

export type ConnectionState =
  | "awaiting-request"
  | "parsing"
  | "resolving"
  | "responding"
  | "closing";

export type CloseReason =
  | "client-closed"
  | "idle-timeout"
  | "connection-close"
  | "parse-error"
  | "transport-error"
  | "internal-error"
  | "shutdown";

export interface ConnectionSummary {
  id: number;
  remoteAddress?: string;
  requests: number;
  reason: CloseReason;
}

export type ConnectionConfig = Pick<
  ServerConfig,
  | "idleTimeoutMs"
  | "requestTimeoutMs"
  | "maxHeaderSize"
  | "maxTargetLength"
  | "quiet"
>;

export interface HttpConnectionOptions {
  id: number;
  socket: ITcpSocket;
  staticServer: StaticServer;
  responses: ResponseContext;
  config: ConnectionConfig;
  logger: Logger;
}

export type HttpConnectionEvents = {
  state: [state: ConnectionState];
  close: [summary: ConnectionSummary];
};

/**
 * One accepted connection, served one request at a time until the client
 * or the protocol ends it. Emits `state` on every transition and `close`
 * with a {@link ConnectionSummary} once the socket has been released.
 */
export class HttpConnection extends EventEmitter<HttpConnectionEvents> {
  readonly id: number;
  private socket: ITcpSocket;
  private parser: HttpRequestStreamParser;
  private staticServer: StaticServer;
  private responses: ResponseContext;
  private config: ConnectionConfig;
  private logger: Logger;
  private currentState: ConnectionState = "awaiting-request";
  private requests = 0;
  private draining = false;
  private finished: Promise<ConnectionSummary> | null = null;

  constructor(options: HttpConnectionOptions) {
    super();
    this.id = options.id;
    this.socket = options.socket;
    this.staticServer = options.staticServer;
    this.responses = options.responses;
    this.config = options.config;
    this.logger = options.logger;
    this.parser = createHttpRequestParser(this.socket);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get requestCount(): number {
    return this.requests;
  }

  /**
   * Serve the connection. Idempotent; every call returns the same promise,
   * which resolves once the connection has closed and never rejects.
   */
  start(): Promise<ConnectionSummary> {
    if (!this.finished) {
      this.finished = this.run();
    }
    return this.finished;
  }

  /**
   * Stop after the current exchange. An idle connection closes at once;
   * one mid-request finishes its response with `Connection: close`.
   */
  shutdown(): void {
    this.draining = true;
    if (this.currentState === "awaiting-request") {
      this.socket.close();
    }
  }

  /** Abort immediately, dropping anything not yet written. */
  destroy(): void {
    if (this.socket.destroy) {
      this.socket.destroy();
      return;
    }
    this.socket.close();
  }

  private async run(): Promise<ConnectionSummary> {
    const remoteAddress = this.socket.remoteAddress;
    this.logger.debug(`Connection ${this.id} opened from ${remoteAddress ?? "?"}`);

    let reason: CloseReason;
    let aborted = false;
    try {
      reason = await this.serve();
    } catch (err) {
      aborted = true;
      if (err instanceof TransportError) {
        reason = "transport-error";
        this.logger.debug(`Connection ${this.id} transport error:`, err);
      } else {
        reason = "internal-error";
        this.logger.error(`Connection ${this.id} failed:`, err);
      }
    }

    this.transition("closing");
    if (aborted) {
      this.destroy();
    } else {
      this.socket.close();
    }

    const summary: ConnectionSummary = {
      id: this.id,
      remoteAddress,
      requests: this.requests,
      reason,
    };
    this.logger.debug(
      `Connection ${this.id} closed (${reason}) after ${this.requests} request(s)`,
    );
    this.emit("close", summary);
    return summary;
  }

  private async serve(): Promise<CloseReason> {
    while (true) {
      this.transition("awaiting-request");
      this.socket.resume?.();

      let request: HttpRequest;
      try {
        request = await this.parser.readRequest({
          limits: {
            maxHeaderSize: this.config.maxHeaderSize,
            maxTargetLength: this.config.maxTargetLength,
          },
          idleTimeoutMs: this.config.idleTimeoutMs,
          requestTimeoutMs: this.config.requestTimeoutMs,
          onFirstByte: () => this.transition("parsing"),
        });
      } catch (err) {
        return this.rejectRequest(err);
      }

      // No further bytes are read until this response is on the wire.
      this.socket.pause?.();
      this.requests++;

      this.transition("resolving");
      const response = await this.staticServer.handleRequest(request, {
        // An unread request body would be parsed as the next request.
        keepAlive: request.keepAlive && !request.declaresBody && !this.draining,
      });
      if (this.draining) {
        // Shutdown began while the response was being prepared.
        response.headers.set("connection", "close");
      }

      this.transition("responding");
      await this.send(response);
      this.logRequest(request, response.status);

      if (this.draining) {
        return "shutdown";
      }
      if (response.headers.get("connection") !== "keep-alive") {
        return "connection-close";
      }
    }
  }

  private async rejectRequest(err: unknown): Promise<CloseReason> {
    if (!(err instanceof HttpRequestParseError)) {
      throw err;
    }

    if (err.status === null) {
      if (err.code === "IDLE_TIMEOUT") return "idle-timeout";
      return this.draining ? "shutdown" : "client-closed";
    }

    this.socket.pause?.();
    this.transition("responding");
    await this.send(
      buildErrorResponse(this.responses, err.status, { keepAlive: false }),
    );
    if (!this.config.quiet) {
      const addr = this.socket.remoteAddress ?? "?";
      this.logger.info(`Rejected request (${err.code}) ${err.status} - ${addr}`);
    }
    return "parse-error";
  }

  private async send(response: HttpResponse): Promise<void> {
    try {
      await writeResponse(this.socket, response);
    } finally {
      if (response.body?.kind === "file") {
        await this.closeFile(response.body.handle);
      }
    }
  }

  private async closeFile(handle: IFileHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn(`Connection ${this.id} failed to close file:`, err);
    }
  }

  private logRequest(request: HttpRequest, status: number): void {
    if (this.config.quiet) return;
    const addr = this.socket.remoteAddress ?? "?";
    this.logger.info(`${request.rawMethod} ${request.target} ${status} - ${addr}`);
  }

  private transition(next: ConnectionState): void {
    if (this.currentState === next) return;
    this.currentState = next;
    this.emit("state", next);
  }
}
