import * as path from "node:path";
import {
  FileSystemError,
  type IFileHandle,
  type IFileStat,
  type IFileSystem,
} from "../interfaces/filesystem.js";
import { fromString } from "../utils/buffer.js";

const MAX_SYMLINK_HOPS = 40;

type MemoryEntry =
  | { kind: "file"; data: Uint8Array; mtime: Date; readable: boolean }
  | { kind: "directory"; mtime: Date }
  | { kind: "symlink"; target: string };

class InMemoryFileHandle implements IFileHandle {
  private closed = false;

  constructor(
    private readonly data: Uint8Array,
    private readonly onClose: () => void,
  ) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }> {
    if (this.closed) {
      throw new FileSystemError("EBADF", "file handle is closed");
    }

    const end = Math.min(position + length, this.data.length);
    const bytesRead = Math.max(0, end - position);
    if (bytesRead > 0) {
      buffer.set(this.data.subarray(position, end), offset);
    }
    return { bytesRead };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.onClose();
  }
}

/**
 * POSIX-style filesystem held in memory: directories, regular files,
 * symbolic links and per-file read permission. Paths are absolute.
 */
export class InMemoryFileSystem implements IFileSystem {
  private readonly entries = new Map<string, MemoryEntry>([
    ["/", { kind: "directory", mtime: new Date(0) }],
  ]);
  private openHandles = 0;

  /** Handles opened and not yet closed. */
  get openHandleCount(): number {
    return this.openHandles;
  }

  writeFile(
    filePath: string,
    content: string | Uint8Array,
    options?: { mtime?: Date },
  ): void {
    const normalized = normalizePath(filePath);
    this.mkdir(path.posix.dirname(normalized));
    this.entries.set(normalized, {
      kind: "file",
      data: typeof content === "string" ? fromString(content) : content.slice(),
      mtime: options?.mtime ?? new Date(),
      readable: true,
    });
  }

  mkdir(dirPath: string): void {
    let current = "/";
    for (const segment of normalizePath(dirPath).split("/").filter(Boolean)) {
      current = path.posix.join(current, segment);
      const existing = this.entries.get(current);
      if (!existing) {
        this.entries.set(current, { kind: "directory", mtime: new Date() });
      } else if (existing.kind === "file") {
        throw new FileSystemError("EEXIST", `file exists at ${current}`);
      }
    }
  }

  /** Create `linkPath` pointing at `target` (relative targets resolve from the link's directory). */
  symlink(target: string, linkPath: string): void {
    const normalized = normalizePath(linkPath);
    this.mkdir(path.posix.dirname(normalized));
    this.entries.set(normalized, { kind: "symlink", target });
  }

  setReadable(filePath: string, readable: boolean): void {
    const entry = this.entries.get(normalizePath(filePath));
    if (entry?.kind !== "file") {
      throw new FileSystemError("ENOENT", `no such file: ${filePath}`);
    }
    entry.readable = readable;
  }

  async open(filePath: string): Promise<IFileHandle> {
    const realPath = this.resolveLinks(filePath);
    const entry = this.entryAt(realPath);
    if (entry.kind === "directory") {
      throw new FileSystemError("EISDIR", `is a directory: ${realPath}`);
    }
    if (entry.kind !== "file") {
      throw new FileSystemError("ENOENT", `no such file: ${realPath}`);
    }
    if (!entry.readable) {
      throw new FileSystemError("EACCES", `permission denied: ${realPath}`);
    }

    this.openHandles++;
    return new InMemoryFileHandle(entry.data, () => {
      this.openHandles--;
    });
  }

  async stat(filePath: string): Promise<IFileStat> {
    const entry = this.entryAt(this.resolveLinks(filePath));
    if (entry.kind === "file") {
      return {
        size: entry.data.length,
        mtime: entry.mtime,
        isDirectory: false,
        isFile: true,
      };
    }
    if (entry.kind === "directory") {
      return { size: 0, mtime: entry.mtime, isDirectory: true, isFile: false };
    }
    throw new FileSystemError("ENOENT", `no such file: ${filePath}`);
  }

  async realpath(filePath: string): Promise<string> {
    return this.resolveLinks(filePath);
  }

  async access(filePath: string): Promise<void> {
    const entry = this.entryAt(this.resolveLinks(filePath));
    if (entry.kind === "file" && !entry.readable) {
      throw new FileSystemError("EACCES", `permission denied: ${filePath}`);
    }
  }

  private entryAt(realPath: string): MemoryEntry {
    const entry = this.entries.get(realPath);
    if (!entry) {
      throw new FileSystemError("ENOENT", `no such file or directory: ${realPath}`);
    }
    return entry;
  }

  private resolveLinks(filePath: string, hops = { count: 0 }): string {
    const segments = normalizePath(filePath).split("/").filter(Boolean);
    let current = "/";

    for (let i = 0; i < segments.length; i++) {
      const next = path.posix.join(current, segments[i]);
      const entry = this.entries.get(next);
      if (!entry) {
        throw new FileSystemError("ENOENT", `no such file or directory: ${next}`);
      }

      if (entry.kind === "symlink") {
        hops.count++;
        if (hops.count > MAX_SYMLINK_HOPS) {
          throw new FileSystemError("ELOOP", `too many symbolic links: ${next}`);
        }
        current = this.resolveLinks(
          path.posix.resolve(current, entry.target),
          hops,
        );
      } else {
        current = next;
      }

      const isLast = i === segments.length - 1;
      if (!isLast && this.entries.get(current)?.kind !== "directory") {
        throw new FileSystemError("ENOTDIR", `not a directory: ${current}`);
      }
    }

    return current;
  }
}

function normalizePath(filePath: string): string {
  return path.posix.resolve("/", filePath);
}
