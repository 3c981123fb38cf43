import { describe, expect, it, vi } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { fromString } from "../utils/buffer.js";
import { HttpRequestParseError, TransportError } from "./errors.js";
import {
  createHttpRequestParser,
  parseRequestHead,
  type RequestParseResult,
  shouldKeepAlive,
} from "./request-parser.js";

/** A socket whose incoming side the test drives by hand. */
function scriptedSocket() {
  const dataCallbacks: Array<(data: Uint8Array) => void> = [];
  const endCallbacks: Array<() => void> = [];
  const errorCallbacks: Array<(err: Error) => void> = [];

  const socket: ITcpSocket = {
    send() {},
    onData(cb) {
      dataCallbacks.push(cb);
    },
    onEnd(cb) {
      endCallbacks.push(cb);
    },
    onClose() {},
    onError(cb) {
      errorCallbacks.push(cb);
    },
    close() {},
  };

  return {
    socket,
    push(text: string) {
      for (const cb of dataCallbacks) cb(fromString(text));
    },
    end() {
      for (const cb of endCallbacks) cb();
    },
    fail(err: Error) {
      for (const cb of errorCallbacks) cb(err);
    },
  };
}

function parse(raw: string, limits?: Parameters<typeof parseRequestHead>[1]) {
  return parseRequestHead(fromString(raw), limits);
}

function expectError(result: RequestParseResult): HttpRequestParseError {
  if (result.kind !== "error") {
    throw new Error(`Expected a parse error, got ${result.kind}`);
  }
  return result.error;
}

describe("parseRequestHead", () => {
  it("parses a simple GET request", () => {
    const raw = "GET /index.html HTTP/1.1\r\nHost: localhost\r\n\r\n";
    const result = parse(raw);

    expect(result.kind).toBe("complete");
    if (result.kind !== "complete") return;
    expect(result.bytesConsumed).toBe(raw.length);
    expect(result.request).toEqual({
      method: "GET",
      rawMethod: "GET",
      target: "/index.html",
      httpVersion: "1.1",
      headers: new Map([["host", "localhost"]]),
      keepAlive: true,
      declaresBody: false,
    });
  });

  it("reports an incomplete head until the blank line arrives", () => {
    expect(parse("GET / HTTP/1.1\r\nHost: x\r\n")).toEqual({
      kind: "incomplete",
    });
    expect(parse("")).toEqual({ kind: "incomplete" });
  });

  it("skips empty lines before the request line", () => {
    const raw = "\r\n\r\nGET / HTTP/1.1\r\n\r\n";
    const result = parse(raw);

    expect(result.kind).toBe("complete");
    if (result.kind !== "complete") return;
    expect(result.request.target).toBe("/");
    expect(result.bytesConsumed).toBe(raw.length);
  });

  it("consumes only the first of pipelined requests", () => {
    const first = "GET /one HTTP/1.1\r\nHost: a\r\n\r\n";
    const result = parse(`${first}GET /two HTTP/1.1\r\n\r\n`);

    expect(result.kind).toBe("complete");
    if (result.kind !== "complete") return;
    expect(result.request.target).toBe("/one");
    expect(result.bytesConsumed).toBe(first.length);
  });

  it("lower-cases header names, trims values and keeps the last duplicate", () => {
    const result = parse(
      "GET / HTTP/1.1\r\nX-Thing:   spaced value \t\r\nAccept: a\r\nACCEPT: b\r\n\r\n",
    );

    expect(result.kind).toBe("complete");
    if (result.kind !== "complete") return;
    expect(result.request.headers.get("x-thing")).toBe("spaced value");
    expect(result.request.headers.get("accept")).toBe("b");
  });

  it("classifies other standard methods as unsupported", () => {
    const result = parse("POST /form HTTP/1.1\r\nContent-Length: 0\r\n\r\n");

    expect(result.kind).toBe("complete");
    if (result.kind !== "complete") return;
    expect(result.request.method).toBe("UNSUPPORTED");
    expect(result.request.rawMethod).toBe("POST");
    expect(result.request.declaresBody).toBe(false);
  });

  it("notes an announced body", () => {
    const withLength = parse("GET / HTTP/1.1\r\nContent-Length: 5\r\n\r\n");
    const chunked = parse("GET / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n");

    expect(withLength.kind === "complete" && withLength.request.declaresBody).toBe(
      true,
    );
    expect(chunked.kind === "complete" && chunked.request.declaresBody).toBe(true);
  });

  it.each([
    ["a request line with two parts", "GET /\r\n\r\n", "MALFORMED_REQUEST_LINE", 400],
    ["a doubled space", "GET  / HTTP/1.1\r\n\r\n", "MALFORMED_REQUEST_LINE", 400],
    ["a method that is not a token", "G@T / HTTP/1.1\r\n\r\n", "MALFORMED_REQUEST_LINE", 400],
    ["an unknown method", "BREW / HTTP/1.1\r\n\r\n", "METHOD_NOT_IMPLEMENTED", 501],
    ["a lower-case method", "get / HTTP/1.1\r\n\r\n", "METHOD_NOT_IMPLEMENTED", 501],
    ["a control byte in the target", "GET /a\u0001b HTTP/1.1\r\n\r\n", "MALFORMED_REQUEST_LINE", 400],
    ["a malformed version", "GET / HTTX/1.1\r\n\r\n", "MALFORMED_REQUEST_LINE", 400],
    ["a truncated version", "GET / HTTP/1\r\n\r\n", "MALFORMED_REQUEST_LINE", 400],
    ["HTTP/2.0", "GET / HTTP/2.0\r\n\r\n", "VERSION_NOT_SUPPORTED", 505],
    ["HTTP/1.2", "GET / HTTP/1.2\r\n\r\n", "VERSION_NOT_SUPPORTED", 505],
    ["a header without a colon", "GET / HTTP/1.1\r\nHost localhost\r\n\r\n", "MALFORMED_HEADER", 400],
    ["a space in a header name", "GET / HTTP/1.1\r\nBad Header: x\r\n\r\n", "MALFORMED_HEADER", 400],
    ["a folded header line", "GET / HTTP/1.1\r\nX-A: 1\r\n  more\r\n\r\n", "MALFORMED_HEADER", 400],
    ["a non-numeric Content-Length", "GET / HTTP/1.1\r\nContent-Length: abc\r\n\r\n", "MALFORMED_HEADER", 400],
  ])("rejects %s", (_name, raw, code, status) => {
    const error = expectError(parse(raw));
    expect(error.code).toBe(code);
    expect(error.status).toBe(status);
  });

  it("rejects a target over the length limit with 414", () => {
    const limits = { maxHeaderSize: 1024, maxTargetLength: 16 };

    const error = expectError(
      parse(`GET /${"a".repeat(20)} HTTP/1.1\r\n\r\n`, limits),
    );
    expect(error.code).toBe("URI_TOO_LONG");
    expect(error.status).toBe(414);
  });

  it("rejects an unterminated request line once it cannot fit", () => {
    const limits = { maxHeaderSize: 1024, maxTargetLength: 16 };

    expect(parse(`GET /${"a".repeat(40)}`, limits)).toEqual({
      kind: "incomplete",
    });
    expect(expectError(parse(`GET /${"a".repeat(100)}`, limits)).code).toBe(
      "URI_TOO_LONG",
    );
  });

  it("rejects oversized headers with 431, terminated or not", () => {
    const limits = { maxHeaderSize: 64, maxTargetLength: 1024 };
    const head = `GET / HTTP/1.1\r\nX-Fill: ${"a".repeat(100)}`;

    const open = expectError(parse(head, limits));
    expect(open.code).toBe("HEADERS_TOO_LARGE");
    expect(open.status).toBe(431);

    const closed = expectError(parse(`${head}\r\n\r\n`, limits));
    expect(closed.code).toBe("HEADERS_TOO_LARGE");
  });
});

describe("shouldKeepAlive", () => {
  it("defaults to persistent connections for HTTP/1.1 only", () => {
    expect(shouldKeepAlive("1.1", new Map())).toBe(true);
    expect(shouldKeepAlive("1.0", new Map())).toBe(false);
  });

  it("honours Connection tokens case-insensitively", () => {
    expect(shouldKeepAlive("1.0", new Map([["connection", "Keep-Alive"]]))).toBe(
      true,
    );
    expect(shouldKeepAlive("1.1", new Map([["connection", "close"]]))).toBe(false);
    expect(
      shouldKeepAlive("1.1", new Map([["connection", "keep-alive, Close"]])),
    ).toBe(false);
  });
});

describe("HttpRequestStreamParser", () => {
  it("assembles a request delivered in pieces", async () => {
    const { socket, push } = scriptedSocket();
    const parser = createHttpRequestParser(socket);

    const pending = parser.readRequest();
    push("GET /file.txt");
    push(" HTTP/1.1\r\nHost: loc");
    push("alhost\r\n\r\n");

    const request = await pending;
    expect(request.target).toBe("/file.txt");
    expect(request.headers.get("host")).toBe("localhost");
  });

  it("keeps pipelined bytes for the next read", async () => {
    const { socket, push } = scriptedSocket();
    const parser = createHttpRequestParser(socket);

    push("GET /one HTTP/1.1\r\n\r\nHEAD /two HTTP/1.1\r\n\r\n");

    const first = await parser.readRequest();
    const second = await parser.readRequest();
    expect(first.target).toBe("/one");
    expect(second.method).toBe("HEAD");
    expect(second.target).toBe("/two");
  });

  it("reports the first byte of each request once", async () => {
    const { socket, push } = scriptedSocket();
    const parser = createHttpRequestParser(socket);
    const onFirstByte = vi.fn();

    const pending = parser.readRequest({ onFirstByte });
    push("GET / HT");
    push("TP/1.1\r\n\r\n");
    await pending;

    expect(onFirstByte).toHaveBeenCalledTimes(1);
  });

  it("times out an idle connection without a status", async () => {
    const { socket } = scriptedSocket();
    const parser = createHttpRequestParser(socket);

    await expect(parser.readRequest({ idleTimeoutMs: 20 })).rejects.toMatchObject(
      { code: "IDLE_TIMEOUT", status: null },
    );
  });

  it("times out a started request with 408", async () => {
    const { socket, push } = scriptedSocket();
    const parser = createHttpRequestParser(socket);

    const pending = parser.readRequest({
      idleTimeoutMs: 1000,
      requestTimeoutMs: 20,
    });
    push("GET / HTTP/1.1\r\n");

    await expect(pending).rejects.toMatchObject({
      code: "REQUEST_TIMEOUT",
      status: 408,
    });
  });

  it("distinguishes a clean close from a truncated request", async () => {
    const clean = scriptedSocket();
    const cleanRead = createHttpRequestParser(clean.socket).readRequest();
    clean.end();
    await expect(cleanRead).rejects.toMatchObject({ code: "CONNECTION_CLOSED" });

    const truncated = scriptedSocket();
    const truncatedRead = createHttpRequestParser(truncated.socket).readRequest();
    truncated.push("GET / HTTP/1.1\r\nHo");
    truncated.end();
    await expect(truncatedRead).rejects.toMatchObject({
      code: "CONNECTION_CLOSED_INCOMPLETE",
      status: null,
    });
  });

  it("surfaces malformed input as a parse error", async () => {
    const { socket, push } = scriptedSocket();
    const pending = createHttpRequestParser(socket).readRequest();
    push("BREW /pot HTTP/1.1\r\n\r\n");

    await expect(pending).rejects.toBeInstanceOf(HttpRequestParseError);
    await expect(pending).rejects.toMatchObject({ status: 501 });
  });

  it("wraps socket errors as transport errors", async () => {
    const { socket, fail } = scriptedSocket();
    const pending = createHttpRequestParser(socket).readRequest();
    fail(new Error("ECONNRESET"));

    await expect(pending).rejects.toBeInstanceOf(TransportError);
  });
});
