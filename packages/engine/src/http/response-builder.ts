import { fromString } from "../utils/buffer.js";
import type { HttpResponse, ResponseBody } from "./types.js";
import { STATUS_TEXT } from "./types.js";

export interface ResponseContext {
  /** Value of the `Server` header. */
  serverName: string;
  /** Clock for the `Date` header. */
  now: () => Date;
}

export interface ResponseOptions {
  status: number;
  keepAlive: boolean;
  headers?: Map<string, string> | Record<string, string>;
  contentType?: string;
  body?: ResponseBody;
  /** Length of the representation; defaults to the length of `body`. */
  contentLength?: number;
  /** Keep the headers of the representation but send no body (HEAD). */
  omitBody?: boolean;
}

// Statuses that never carry a body, so they get no Content-Length either.
const BODILESS_STATUSES = new Set([204, 304]);

const SPECIAL_HEADER_NAMES: Record<string, string> = {
  etag: "ETag",
};

function bodyLength(body?: ResponseBody): number {
  if (!body) return 0;
  return body.kind === "bytes" ? body.data.length : body.size;
}

export function buildResponse(
  context: ResponseContext,
  options: ResponseOptions,
): HttpResponse {
  const bodiless = BODILESS_STATUSES.has(options.status);
  const headers = new Map<string, string>();
  headers.set("server", context.serverName);
  headers.set("date", context.now().toUTCString());

  if (options.contentType && !bodiless) {
    headers.set("content-type", options.contentType);
  }
  if (!bodiless) {
    headers.set(
      "content-length",
      String(options.contentLength ?? bodyLength(options.body)),
    );
  }
  for (const [key, value] of normalizeHeaders(options.headers)) {
    headers.set(key, value);
  }
  headers.set("connection", options.keepAlive ? "keep-alive" : "close");

  return {
    status: options.status,
    statusText: STATUS_TEXT[options.status] ?? "Unknown",
    headers,
    body: options.omitBody || bodiless ? undefined : options.body,
  };
}

/**
 * Error response with a small HTML page naming the status.
 */
export function buildErrorResponse(
  context: ResponseContext,
  status: number,
  options: {
    keepAlive: boolean;
    omitBody?: boolean;
    headers?: Map<string, string> | Record<string, string>;
  },
): HttpResponse {
  const title = `${status} ${STATUS_TEXT[status] ?? "Unknown"}`;
  const page = `<html><body><h1>${title}</h1></body></html>`;
  return buildResponse(context, {
    status,
    keepAlive: options.keepAlive,
    headers: options.headers,
    contentType: "text/html; charset=utf-8",
    body: { kind: "bytes", data: fromString(page) },
    omitBody: options.omitBody,
  });
}

/** Status line, header lines and the terminating blank line. */
export function serializeResponseHead(response: HttpResponse): Uint8Array {
  const lines: string[] = [`HTTP/1.1 ${response.status} ${response.statusText}`];
  for (const [key, value] of response.headers) {
    lines.push(`${canonicalHeaderName(key)}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return fromString(lines.join("\r\n"));
}

export function canonicalHeaderName(name: string): string {
  const lower = name.toLowerCase();
  return (
    SPECIAL_HEADER_NAMES[lower] ??
    lower
      .split("-")
      .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
      .join("-")
  );
}

function normalizeHeaders(
  headers?: Map<string, string> | Record<string, string>,
): Map<string, string> {
  const map = new Map<string, string>();
  if (!headers) return map;
  const entries =
    headers instanceof Map ? headers.entries() : Object.entries(headers);
  for (const [key, value] of entries) {
    map.set(key.toLowerCase(), value);
  }
  return map;
}
