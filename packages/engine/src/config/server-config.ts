import { DEFAULT_JS_MIME_TYPE } from "../server/mime-types.js";

export const SERVER_NAME = "docroot/0.1";
export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = "0.0.0.0";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** Document root. Nothing outside it is ever served. */
  root: string;
  /** Log at debug level when no logger is supplied. Default: false */
  debug: boolean;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Close a connection that sends nothing for this long. Default: 30000ms */
  idleTimeoutMs: number;
  /** Max time between the first byte of a request and its full head. Default: 10000ms */
  requestTimeoutMs: number;
  /** How long `stop()` waits for in-flight responses. Default: 5000ms */
  shutdownTimeoutMs: number;
  /** Max size of the request line plus headers. Default: 16KB */
  maxHeaderSize: number;
  /** Max length of the request target. Default: 8KB */
  maxTargetLength: number;
  /** Value of the `Server` response header. */
  serverName: string;
  /** Content-Type for `.js` files. Default: 'application/javascript' */
  jsMimeType: string;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    root,
    debug: false,
    quiet: false,
    idleTimeoutMs: 30_000,
    requestTimeoutMs: 10_000,
    shutdownTimeoutMs: 5000,
    maxHeaderSize: 16 * 1024,
    maxTargetLength: 8 * 1024,
    serverName: SERVER_NAME,
    jsMimeType: DEFAULT_JS_MIME_TYPE,
  };
}
