import * as path from "node:path";
import {
  fileSystemErrorCode,
  type IFileSystem,
} from "../interfaces/filesystem.js";

export const INDEX_FILE = "index.html";

export type ResolvedTarget =
  | {
      outcome: "found";
      /** Canonical absolute path of the file to serve. */
      path: string;
      /** The target named a directory and its index file was substituted. */
      isDirectory: boolean;
      size: number;
      mtime: Date;
    }
  | { outcome: "not-found"; reason: string }
  | { outcome: "forbidden"; reason: string };

const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR", "ENAMETOOLONG"]);

function notFound(reason: string): ResolvedTarget {
  return { outcome: "not-found", reason };
}

function forbidden(reason: string): ResolvedTarget {
  return { outcome: "forbidden", reason };
}

export function resolutionFailure(
  err: unknown,
  filePath: string,
): ResolvedTarget {
  const code = fileSystemErrorCode(err) ?? "UNKNOWN";
  return NOT_FOUND_CODES.has(code)
    ? notFound(`${code} ${filePath}`)
    : forbidden(`${code} ${filePath}`);
}

export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") return true;
  return (
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

/**
 * Decode the path part of a request target into normalized segments.
 * Returns null when the target is not an origin-form path, is malformed,
 * or climbs above the root.
 */
export function normalizeTargetPath(
  target: string,
): { segments: string[]; trailingSlash: boolean } | null {
  // Strip query string and fragment
  const pathPart = target.split("?")[0].split("#")[0];
  if (!pathPart.startsWith("/")) return null;

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathPart);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) return null;

  const segments: string[] = [];
  for (const segment of decoded.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (segments.length === 0) return null;
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  return { segments, trailingSlash: decoded.length > 1 && decoded.endsWith("/") };
}

/**
 * Map a raw request target onto a file inside `root`.
 *
 * The result is always a structured outcome; filesystem failures are
 * folded into `not-found` or `forbidden`. Every path that reaches the
 * filesystem is canonicalised and must stay inside the canonical root, so
 * neither `..` segments (encoded or not) nor symbolic links can leave it.
 */
export async function resolveRequestTarget(
  target: string,
  root: string,
  fs: IFileSystem,
): Promise<ResolvedTarget> {
  const normalized = normalizeTargetPath(target);
  if (!normalized) {
    return forbidden(`invalid or escaping target ${target}`);
  }

  let realRoot: string;
  try {
    realRoot = await fs.realpath(root);
  } catch (err) {
    return resolutionFailure(err, root);
  }

  const candidate = path.join(realRoot, ...normalized.segments);
  const located = await locateInsideRoot(candidate, realRoot, fs);
  if (located.outcome !== "found") return located;

  if (located.isDirectory) {
    const index = await locateInsideRoot(
      path.join(located.path, INDEX_FILE),
      realRoot,
      fs,
    );
    if (index.outcome === "not-found") {
      return notFound(`directory without ${INDEX_FILE}: ${located.path}`);
    }
    if (index.outcome !== "found") return index;
    if (index.isDirectory) {
      return notFound(`${INDEX_FILE} is a directory: ${index.path}`);
    }
    return checkReadable({ ...index, isDirectory: true }, fs);
  }

  if (normalized.trailingSlash) {
    return notFound(`not a directory: ${located.path}`);
  }
  return checkReadable(located, fs);
}

async function locateInsideRoot(
  candidate: string,
  realRoot: string,
  fs: IFileSystem,
): Promise<ResolvedTarget> {
  let realPath: string;
  try {
    realPath = await fs.realpath(candidate);
  } catch (err) {
    return resolutionFailure(err, candidate);
  }

  if (!isWithinRoot(realRoot, realPath)) {
    return forbidden(`${candidate} resolves outside the root to ${realPath}`);
  }

  try {
    const stat = await fs.stat(realPath);
    if (!stat.isDirectory && !stat.isFile) {
      return forbidden(`not a regular file: ${realPath}`);
    }
    return {
      outcome: "found",
      path: realPath,
      isDirectory: stat.isDirectory,
      size: stat.size,
      mtime: stat.mtime,
    };
  } catch (err) {
    return resolutionFailure(err, realPath);
  }
}

async function checkReadable(
  resolved: ResolvedTarget,
  fs: IFileSystem,
): Promise<ResolvedTarget> {
  if (resolved.outcome !== "found") return resolved;
  try {
    await fs.access(resolved.path);
    return resolved;
  } catch (err) {
    return resolutionFailure(err, resolved.path);
  }
}
