// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  defaultConfig,
  SERVER_NAME,
} from "./config/server-config.js";
// HTTP
export {
  HttpRequestParseError,
  type HttpRequestParseErrorCode,
  TransportError,
} from "./http/errors.js";
export {
  createHttpRequestParser,
  DEFAULT_REQUEST_LIMITS,
  HttpRequestStreamParser,
  parseRequestHead,
  type ReadRequestOptions,
  type RequestLimits,
  type RequestParseResult,
} from "./http/request-parser.js";
export {
  buildErrorResponse,
  buildResponse,
  type ResponseContext,
  type ResponseOptions,
  serializeResponseHead,
} from "./http/response-builder.js";
export { writeResponse } from "./http/response-writer.js";
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpVersion,
  ResponseBody,
} from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export {
  FileSystemError,
  fileSystemErrorCode,
  type IFileHandle,
  type IFileStat,
  type IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  CloseReason,
  ConnectionState,
  ConnectionSummary,
} from "./server/http-connection.js";
export { HttpConnection } from "./server/http-connection.js";
export { createMimeTypeLookup, getMimeType } from "./server/mime-types.js";
export {
  type ResolvedTarget,
  resolveRequestTarget,
} from "./server/path-resolver.js";
export type { StaticServerOptions } from "./server/static-server.js";
export { StaticServer } from "./server/static-server.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
// Utils
export { EventEmitter } from "./utils/event-emitter.js";
