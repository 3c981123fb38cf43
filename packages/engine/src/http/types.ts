import type { IFileHandle } from "../interfaces/filesystem.js";

/**
 * Methods the server distinguishes. Standard methods other than GET and
 * HEAD parse as `UNSUPPORTED` and are answered with 405.
 */
export type HttpMethod = "GET" | "HEAD" | "UNSUPPORTED";

export type HttpVersion = "1.0" | "1.1";

export interface HttpRequest {
  readonly method: HttpMethod;
  /** Method token exactly as received. */
  readonly rawMethod: string;
  /** Request target as received, still percent-encoded. */
  readonly target: string;
  readonly httpVersion: HttpVersion;
  /** Header names are lower-cased; the last duplicate wins. */
  readonly headers: ReadonlyMap<string, string>;
  readonly keepAlive: boolean;
  /** Whether the client announced a body (never read by this server). */
  readonly declaresBody: boolean;
}

export type ResponseBody =
  | { kind: "bytes"; data: Uint8Array }
  | { kind: "file"; handle: IFileHandle; size: number };

export interface HttpResponse {
  status: number;
  statusText: string;
  /** Lower-cased header names in emission order. */
  headers: Map<string, string>;
  body?: ResponseBody;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  304: "Not Modified",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  414: "URI Too Long",
  431: "Request Header Fields Too Large",
  500: "Internal Server Error",
  501: "Not Implemented",
  505: "HTTP Version Not Supported",
};

export const ALLOWED_METHODS = "GET, HEAD";
