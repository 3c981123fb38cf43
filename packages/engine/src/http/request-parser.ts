import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfSequence } from "../utils/buffer.js";
import {
  HttpRequestParseError,
  type HttpRequestParseErrorCode,
  TransportError,
} from "./errors.js";
import type { HttpMethod, HttpRequest, HttpVersion } from "./types.js";

const CRLF = new Uint8Array([13, 10]); // \r\n
const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_IDLE_TIMEOUT_MS = 30_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
// Room for the method, the version and the two separating spaces.
const REQUEST_LINE_OVERHEAD = 32;

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HTTP_VERSION = /^HTTP\/\d\.\d$/;
const CONTROL_OR_SPACE = /[\u0000- \u007f]/;
const CONTENT_LENGTH = /^\d+$/;

const UNSUPPORTED_METHODS = new Set([
  "POST",
  "PUT",
  "DELETE",
  "OPTIONS",
  "PATCH",
  "TRACE",
  "CONNECT",
]);

export interface RequestLimits {
  /** Max bytes of request line plus headers. */
  maxHeaderSize: number;
  /** Max length of the request target. */
  maxTargetLength: number;
}

export const DEFAULT_REQUEST_LIMITS: RequestLimits = {
  maxHeaderSize: 16 * 1024,
  maxTargetLength: 8 * 1024,
};

export type RequestParseResult =
  | { kind: "complete"; request: HttpRequest; bytesConsumed: number }
  | { kind: "incomplete" }
  | { kind: "error"; error: HttpRequestParseError };

function fail(
  code: HttpRequestParseErrorCode,
  message: string,
): RequestParseResult {
  return { kind: "error", error: new HttpRequestParseError(code, message) };
}

function skipLeadingLineBreaks(buffer: Uint8Array): number {
  let offset = 0;
  while (buffer[offset] === 13 && buffer[offset + 1] === 10) {
    offset += 2;
  }
  return offset;
}

function classifyMethod(rawMethod: string): HttpMethod | null {
  if (rawMethod === "GET" || rawMethod === "HEAD") return rawMethod;
  if (UNSUPPORTED_METHODS.has(rawMethod)) return "UNSUPPORTED";
  return null;
}

export function shouldKeepAlive(
  httpVersion: HttpVersion,
  headers: ReadonlyMap<string, string>,
): boolean {
  const tokens = (headers.get("connection") ?? "")
    .split(",")
    .map((token) => token.trim().toLowerCase());
  if (tokens.includes("close")) return false;
  return httpVersion === "1.1" || tokens.includes("keep-alive");
}

/**
 * Parse one request head (request line and headers) from the front of
 * `buffer`. Never throws: malformed input is reported as an `error` result
 * carrying the status to answer with.
 */
export function parseRequestHead(
  buffer: Uint8Array,
  limits: RequestLimits = DEFAULT_REQUEST_LIMITS,
): RequestParseResult {
  const start = skipLeadingLineBreaks(buffer);
  const separatorIndex = indexOfSequence(buffer, CRLF_CRLF, start);

  if (separatorIndex === -1) {
    const lineEnd = indexOfSequence(buffer, CRLF, start);
    if (
      lineEnd === -1 &&
      buffer.length - start > limits.maxTargetLength + REQUEST_LINE_OVERHEAD
    ) {
      return fail("URI_TOO_LONG", "Request line too long");
    }
    if (buffer.length > limits.maxHeaderSize) {
      return fail("HEADERS_TOO_LARGE", "Request headers too large");
    }
    return { kind: "incomplete" };
  }

  if (separatorIndex > limits.maxHeaderSize) {
    return fail("HEADERS_TOO_LARGE", "Request headers too large");
  }

  const lines = decodeToString(buffer.subarray(start, separatorIndex)).split(
    "\r\n",
  );

  const parts = lines[0].split(" ");
  if (parts.length !== 3 || parts.some((part) => part === "")) {
    return fail("MALFORMED_REQUEST_LINE", "Malformed request line");
  }
  const [rawMethod, target, rawVersion] = parts;

  if (!TOKEN.test(rawMethod)) {
    return fail("MALFORMED_REQUEST_LINE", "Invalid method token");
  }
  const method = classifyMethod(rawMethod);
  if (method === null) {
    return fail("METHOD_NOT_IMPLEMENTED", `Method not implemented: ${rawMethod}`);
  }

  if (target.length > limits.maxTargetLength) {
    return fail("URI_TOO_LONG", "Request target too long");
  }
  if (CONTROL_OR_SPACE.test(target)) {
    return fail("MALFORMED_REQUEST_LINE", "Invalid characters in request target");
  }

  if (!HTTP_VERSION.test(rawVersion)) {
    return fail("MALFORMED_REQUEST_LINE", "Malformed HTTP version");
  }
  const version = rawVersion.slice("HTTP/".length);
  if (version !== "1.0" && version !== "1.1") {
    return fail("VERSION_NOT_SUPPORTED", `Unsupported version: ${rawVersion}`);
  }

  const headers = new Map<string, string>();
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.startsWith(" ") || line.startsWith("\t")) {
      return fail("MALFORMED_HEADER", "Obsolete header line folding");
    }
    const colonIdx = line.indexOf(":");
    const name = colonIdx === -1 ? "" : line.substring(0, colonIdx);
    if (!TOKEN.test(name)) {
      return fail("MALFORMED_HEADER", "Malformed header line");
    }
    const value = line.substring(colonIdx + 1).replace(/^[ \t]+|[ \t]+$/g, "");
    headers.set(name.toLowerCase(), value);
  }

  const contentLength = headers.get("content-length");
  if (contentLength !== undefined && !CONTENT_LENGTH.test(contentLength)) {
    return fail("MALFORMED_HEADER", "Invalid Content-Length");
  }

  const request: HttpRequest = {
    method,
    rawMethod,
    target,
    httpVersion: version,
    headers,
    keepAlive: shouldKeepAlive(version, headers),
    declaresBody:
      headers.has("transfer-encoding") ||
      (contentLength !== undefined && Number(contentLength) > 0),
  };

  return {
    kind: "complete",
    request,
    bytesConsumed: separatorIndex + CRLF_CRLF.length,
  };
}

export interface ReadRequestOptions {
  limits?: RequestLimits;
  /** How long to wait for the first byte of the next request. */
  idleTimeoutMs?: number;
  /** How long a started request may take to arrive in full. */
  requestTimeoutMs?: number;
  /** Called once when the first byte of this request is available. */
  onFirstByte?: () => void;
}

export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private ended = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onEnd?.(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.ended = true;
      this.notifyWaiters();
    });
  }

  /**
   * Wait for the next complete request head. Bytes that follow it stay
   * buffered for the next call.
   */
  async readRequest(options?: ReadRequestOptions): Promise<HttpRequest> {
    const limits = options?.limits ?? DEFAULT_REQUEST_LIMITS;
    const requestTimeoutMs =
      options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const idleDeadline =
      Date.now() + (options?.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS);
    let requestDeadline: number | null = null;

    while (true) {
      if (this.socketError) {
        throw new TransportError("Socket error while reading request", {
          cause: this.socketError,
        });
      }

      if (this.buffer.length > 0 && requestDeadline === null) {
        requestDeadline = Date.now() + requestTimeoutMs;
        options?.onFirstByte?.();
      }

      const result = parseRequestHead(this.buffer, limits);
      if (result.kind === "complete") {
        this.buffer = this.buffer.slice(result.bytesConsumed);
        return result.request;
      }
      if (result.kind === "error") {
        throw result.error;
      }

      if (this.ended) {
        if (skipLeadingLineBreaks(this.buffer) === this.buffer.length) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }

        throw new HttpRequestParseError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      const deadline = requestDeadline ?? idleDeadline;
      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (requestDeadline === null) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}
