import cluster from "node:cluster";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  fileSystemErrorCode,
  filteredLogger,
  type Logger,
  prefixedLogger,
} from "@docroot/engine";
import {
  HELP_TEXT,
  parseArgs,
  type ServeOptions,
} from "./args.js";

export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StartupError";
  }
}

export async function readVersion(): Promise<string> {
  const raw = await fs.readFile(new URL("../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(raw);
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  throw new StartupError("package.json has no version");
}

/** Absolute, symlink-free path of an existing directory. */
export async function resolveRoot(root: string): Promise<string> {
  const absolute = path.resolve(root);
  try {
    const stat = await fs.stat(absolute);
    if (!stat.isDirectory()) {
      throw new StartupError(`Document root is not a directory: ${absolute}`);
    }
    return await fs.realpath(absolute);
  } catch (err) {
    if (err instanceof StartupError) throw err;
    if (fileSystemErrorCode(err) === "ENOENT") {
      throw new StartupError(`Document root does not exist: ${absolute}`);
    }
    throw new StartupError(
      `Cannot use document root ${absolute}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function createLogger(options: ServeOptions): Logger {
  const tag = cluster.isWorker ? `docroot:${process.pid}` : "docroot";
  return filteredLogger(
    options.debug ? "debug" : "info",
    prefixedLogger(tag, basicLogger()),
  );
}

async function serve(options: ServeOptions, root: string, logger: Logger): Promise<void> {
  const config = {
    ...defaultConfig(root),
    port: options.port,
    host: options.host,
    debug: options.debug,
    quiet: options.quiet,
  };

  const server = createNodeServer({ config, logger });
  const port = await server.start();
  logger.info(`Serving ${root} on http://${config.host}:${port}`);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

function supervise(options: ServeOptions, root: string, logger: Logger): void {
  logger.info(`Starting ${options.workers} workers for ${root}`);
  for (let i = 0; i < options.workers; i++) {
    cluster.fork();
  }

  let alive = options.workers;
  let stopping = false;

  cluster.on("exit", (worker, code, signal) => {
    alive--;
    const status = signal ?? `code ${code}`;
    if (stopping) {
      logger.debug(`Worker ${worker.process.pid} exited (${status})`);
    } else {
      logger.warn(`Worker ${worker.process.pid} exited unexpectedly (${status})`);
    }
    if (alive === 0) {
      process.exit(stopping ? 0 : 1);
    }
  });

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, stopping workers`);
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.process.kill("SIGTERM");
    }
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

export async function main(argv: string[]): Promise<void> {
  const command = parseArgs(argv);
  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "version") {
    console.log(await readVersion());
    return;
  }

  const { options } = command;
  const logger = createLogger(options);
  const root = await resolveRoot(options.root);

  if (options.workers > 1 && cluster.isPrimary) {
    supervise(options, root, logger);
    return;
  }
  await serve(options, root, logger);
}
