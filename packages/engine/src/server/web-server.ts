import type { ServerConfig } from "../config/server-config.js";
import { toError } from "../http/errors.js";
import type { ResponseContext } from "../http/response-builder.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger, filteredLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { type ConnectionSummary, HttpConnection } from "./http-connection.js";
import { createMimeTypeLookup } from "./mime-types.js";
import { StaticServer } from "./static-server.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Clock for `Date` headers. Default: `() => new Date()` */
  clock?: () => Date;
}

export type WebServerEvents = {
  listening: [port: number];
  connection: [connection: HttpConnection];
  connectionClosed: [summary: ConnectionSummary];
  error: [err: Error];
  close: [];
};

/** Accept loop: hands every accepted socket to its own {@link HttpConnection}. */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private responses: ResponseContext;
  private tcpServer: ITcpServer | null = null;
  private staticServer: StaticServer;
  private activeConnections: Set<HttpConnection> = new Set();
  private nextConnectionId = 1;

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger =
      options.logger ??
      filteredLogger(this.config.debug ? "debug" : "info", basicLogger());
    this.responses = {
      serverName: this.config.serverName,
      now: options.clock ?? (() => new Date()),
    };

    this.staticServer = new StaticServer({
      root: this.config.root,
      fs: options.fileSystem,
      responses: this.responses,
      mimeTypes: createMimeTypeLookup({ ".js": this.config.jsMimeType }),
      logger: this.logger,
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.onConnection((rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket);
      });

      server.onError((err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.logger.debug(`Listening on ${this.config.host}:${port}`);
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  /**
   * Serve one accepted connection. The returned connection's `start()`
   * promise settles when it closes.
   */
  handleConnection(socket: ITcpSocket): HttpConnection {
    const connection = new HttpConnection({
      id: this.nextConnectionId++,
      socket,
      staticServer: this.staticServer,
      responses: this.responses,
      config: this.config,
      logger: this.logger,
    });

    this.activeConnections.add(connection);
    this.emit("connection", connection);

    connection.start().then(
      (summary) => {
        this.activeConnections.delete(connection);
        this.emit("connectionClosed", summary);
      },
      (err) => {
        this.activeConnections.delete(connection);
        this.logger.error("Connection handler failed:", toError(err));
      },
    );

    return connection;
  }

  /**
   * Stop accepting, let in-flight responses finish, and close everything.
   * Connections still open after `shutdownTimeoutMs` are destroyed.
   */
  async stop(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;

    const serverClosed = new Promise<void>((resolve) => {
      if (!server) {
        resolve();
        return;
      }
      server.close(() => resolve());
    });

    const connections = [...this.activeConnections];
    for (const connection of connections) {
      connection.shutdown();
    }

    const drained = await settlesWithin(
      Promise.all(connections.map((connection) => connection.start())),
      this.config.shutdownTimeoutMs,
    );
    if (!drained) {
      this.logger.warn(
        `Destroying ${this.activeConnections.size} connection(s) still open after ${this.config.shutdownTimeoutMs}ms`,
      );
      for (const connection of this.activeConnections) {
        connection.destroy();
      }
    }

    await serverClosed;
    this.emit("close");
  }
}

function settlesWithin(
  promise: Promise<unknown>,
  timeoutMs: number,
): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(done, done);
  });
}
