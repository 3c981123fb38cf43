/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the server engine from any specific runtime,
 * so the core can be driven by Node's `net` module or by the in-memory
 * socket pair used in tests.
 */

export interface ITcpSocket {
  /** Send data to the remote peer. Fire-and-forget. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve when it has been accepted without backpressure.
   * Rejects if the socket is closed or fails during the write.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for the peer ending its side of the stream. */
  onEnd?(cb: () => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Stop delivering incoming data until `resume` is called. */
  pause?(): void;

  /** Resume delivering incoming data, flushing anything held while paused. */
  resume?(): void;

  /** Flush pending writes, then close the connection. */
  close(): void;

  /** Close the connection immediately, discarding pending writes. */
  destroy?(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface ITcpServer {
  /** Start listening on the specified port and optional host. */
  listen(port: number, host?: string, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  onConnection(cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  onError(cb: (err: Error) => void): void;

  /** Stop accepting connections. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a platform socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
