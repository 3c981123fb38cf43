import { DEFAULT_HOST, DEFAULT_PORT } from "@docroot/engine";

export const DEFAULT_ROOT = "./static";

export interface ServeOptions {
  root: string;
  port: number;
  host: string;
  workers: number;
  debug: boolean;
  quiet: boolean;
}

export type CliCommand =
  | { kind: "serve"; options: ServeOptions }
  | { kind: "help" }
  | { kind: "version" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
docroot - serve a directory over HTTP/1.1 (GET and HEAD only)

Usage: docroot [root] [options]

Options:
  --root, -r <dir>       Document root (default: ${DEFAULT_ROOT})
  --port, -p <port>      Port to listen on (default: ${DEFAULT_PORT})
  --host, -H <host>      Host to bind (default: ${DEFAULT_HOST})
  --workers, -w <n>      Worker processes sharing the port (default: 1)
  --debug, -d            Log at debug level
  --quiet, -q            Suppress request logging
  --version, -v          Show version
  --help, -h             Show this help
`;

function parseInteger(flag: string, raw: string, min: number, max: number): number {
  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`Invalid value for ${flag}: ${raw}`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new CliUsageError(
      `Invalid value for ${flag}: ${raw} (expected ${min}-${max})`,
    );
  }
  return value;
}

export function parseArgs(args: string[]): CliCommand {
  const options: ServeOptions = {
    root: DEFAULT_ROOT,
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    workers: 1,
    debug: false,
    quiet: false,
  };
  let sawPositional = false;

  let i = 0;
  const valueFor = (flag: string): string => {
    const value = args[++i];
    if (value === undefined || value === "") {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === "--root" || arg === "-r") {
      options.root = valueFor(arg);
    } else if (arg === "--port" || arg === "-p") {
      options.port = parseInteger(arg, valueFor(arg), 0, 65535);
    } else if (arg === "--host" || arg === "-H") {
      options.host = valueFor(arg);
    } else if (arg === "--workers" || arg === "-w") {
      options.workers = parseInteger(arg, valueFor(arg), 1, 256);
    } else if (arg === "--debug" || arg === "-d") {
      options.debug = true;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      if (sawPositional) {
        throw new CliUsageError(`Unexpected argument: ${arg}`);
      }
      sawPositional = true;
      options.root = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "serve", options };
}
