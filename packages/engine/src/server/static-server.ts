import {
  buildErrorResponse,
  buildResponse,
  type ResponseContext,
} from "../http/response-builder.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import { ALLOWED_METHODS } from "../http/types.js";
import type { IFileHandle, IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { getMimeType, type MimeTypeLookup } from "./mime-types.js";
import {
  type ResolvedTarget,
  resolutionFailure,
  resolveRequestTarget,
} from "./path-resolver.js";

type FoundTarget = Extract<ResolvedTarget, { outcome: "found" }>;

export interface StaticServerOptions {
  root: string;
  fs: IFileSystem;
  responses: ResponseContext;
  mimeTypes?: MimeTypeLookup;
  logger?: Logger;
}

export interface HandleRequestOptions {
  /** Negotiated connection state, echoed in the `Connection` header. */
  keepAlive: boolean;
}

/**
 * Turns a parsed request into a response for a file under the document
 * root. A returned file body holds an open handle the caller must close.
 */
export class StaticServer {
  private root: string;
  private fs: IFileSystem;
  private responses: ResponseContext;
  private mimeTypes: MimeTypeLookup;
  private logger?: Logger;

  constructor(options: StaticServerOptions) {
    this.root = options.root;
    this.fs = options.fs;
    this.responses = options.responses;
    this.mimeTypes = options.mimeTypes ?? getMimeType;
    this.logger = options.logger;
  }

  async handleRequest(
    request: HttpRequest,
    options: HandleRequestOptions,
  ): Promise<HttpResponse> {
    const { keepAlive } = options;
    const omitBody = request.method === "HEAD";

    if (request.method === "UNSUPPORTED") {
      return buildErrorResponse(this.responses, 405, {
        keepAlive,
        headers: { allow: ALLOWED_METHODS },
      });
    }

    try {
      const resolved = await resolveRequestTarget(
        request.target,
        this.root,
        this.fs,
      );

      switch (resolved.outcome) {
        case "not-found":
          this.logger?.debug(`Not found ${request.target}: ${resolved.reason}`);
          return buildErrorResponse(this.responses, 404, { keepAlive, omitBody });
        case "forbidden":
          this.logger?.debug(`Forbidden ${request.target}: ${resolved.reason}`);
          return buildErrorResponse(this.responses, 403, { keepAlive, omitBody });
        case "found":
          return await this.serveFile(request, resolved, keepAlive);
      }
    } catch (err) {
      this.logger?.error("Error serving request:", err);
      return buildErrorResponse(this.responses, 500, {
        keepAlive: false,
        omitBody,
      });
    }
  }

  private async serveFile(
    request: HttpRequest,
    file: FoundTarget,
    keepAlive: boolean,
  ): Promise<HttpResponse> {
    const etag = `"${file.mtime.getTime().toString(36)}-${file.size.toString(36)}"`;
    const headers = new Map<string, string>([
      ["last-modified", file.mtime.toUTCString()],
      ["etag", etag],
    ]);
    const contentType = this.mimeTypes(file.path);

    if (matchesEtag(request.headers.get("if-none-match"), etag)) {
      return buildResponse(this.responses, { status: 304, keepAlive, headers });
    }

    // HEAD: the headers a GET would get, without opening the file
    if (request.method === "HEAD") {
      return buildResponse(this.responses, {
        status: 200,
        keepAlive,
        headers,
        contentType,
        contentLength: file.size,
        omitBody: true,
      });
    }

    let handle: IFileHandle;
    try {
      handle = await this.fs.open(file.path);
    } catch (err) {
      const failure = resolutionFailure(err, file.path);
      const status = failure.outcome === "not-found" ? 404 : 403;
      return buildErrorResponse(this.responses, status, { keepAlive });
    }

    return buildResponse(this.responses, {
      status: 200,
      keepAlive,
      headers,
      contentType,
      body: { kind: "file", handle, size: file.size },
    });
  }
}

function matchesEtag(ifNoneMatch: string | undefined, etag: string): boolean {
  if (!ifNoneMatch) return false;
  if (ifNoneMatch.trim() === "*") return true;
  return ifNoneMatch
    .split(",")
    .map((tag) => tag.trim().replace(/^W\//, ""))
    .includes(etag);
}
