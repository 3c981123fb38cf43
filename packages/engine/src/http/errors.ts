export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "URI_TOO_LONG"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER"
  | "METHOD_NOT_IMPLEMENTED"
  | "VERSION_NOT_SUPPORTED";

/** Status to answer with, or `null` when the connection closes silently. */
const PARSE_ERROR_STATUS: Record<HttpRequestParseErrorCode, number | null> = {
  IDLE_TIMEOUT: null,
  CONNECTION_CLOSED: null,
  CONNECTION_CLOSED_INCOMPLETE: null,
  REQUEST_TIMEOUT: 408,
  HEADERS_TOO_LARGE: 431,
  URI_TOO_LONG: 414,
  MALFORMED_REQUEST_LINE: 400,
  MALFORMED_HEADER: 400,
  METHOD_NOT_IMPLEMENTED: 501,
  VERSION_NOT_SUPPORTED: 505,
};

export class HttpRequestParseError extends Error {
  readonly status: number | null;

  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
    this.status = PARSE_ERROR_STATUS[code];
  }
}

/**
 * A failure of the underlying byte stream. The connection is torn down
 * without attempting any further writes.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
