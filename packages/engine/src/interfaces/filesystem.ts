/**
 * Abstract File System Interfaces
 *
 * Read-only view of the filesystem the server needs. Failures reject with
 * errors carrying a Node-style `code` (`ENOENT`, `EACCES`, `ELOOP`, ...),
 * which `fileSystemErrorCode` extracts.
 */

export interface IFileStat {
  size: number;
  mtime: Date;
  isDirectory: boolean;
  isFile: boolean;
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>;

  /** Close the file handle. */
  close(): Promise<void>;
}

export interface IFileSystem {
  /** Open a file for reading. */
  open(path: string): Promise<IFileHandle>;

  /** Get file statistics, following symbolic links. */
  stat(path: string): Promise<IFileStat>;

  /** Canonical absolute path with every symbolic link resolved. */
  realpath(path: string): Promise<string>;

  /** Resolve when the current process may read the file, reject otherwise. */
  access(path: string): Promise<void>;
}

export class FileSystemError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(`${code}: ${message}`);
    this.name = "FileSystemError";
  }
}

export function fileSystemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
