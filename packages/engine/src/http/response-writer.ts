import type { IFileHandle } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat } from "../utils/buffer.js";
import { TransportError } from "./errors.js";
import { serializeResponseHead } from "./response-builder.js";
import type { HttpResponse } from "./types.js";

const CHUNK_SIZE = 64 * 1024; // 64KB chunks

/**
 * Write a complete response: the header block, then the body if there is
 * one. Small in-memory bodies go out in the same write as the headers;
 * files are streamed in chunks, waiting for the socket to drain.
 */
export async function writeResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const headerBytes = serializeResponseHead(response);
  const body = response.body;

  if (!body) {
    await sendChunk(socket, headerBytes);
    return;
  }

  if (body.kind === "bytes") {
    await sendChunk(socket, concat([headerBytes, body.data]));
    return;
  }

  await sendChunk(socket, headerBytes);
  await streamFile(socket, body.handle, body.size);
}

async function streamFile(
  socket: ITcpSocket,
  fileHandle: IFileHandle,
  fileSize: number,
): Promise<void> {
  let position = 0;
  let remaining = fileSize;

  while (remaining > 0) {
    // Fresh buffer per chunk: the socket may still hold the previous one.
    const chunk = new Uint8Array(Math.min(CHUNK_SIZE, remaining));
    const { bytesRead } = await fileHandle.read(chunk, 0, chunk.length, position);
    if (bytesRead === 0) {
      // Content-Length is already on the wire.
      throw new TransportError(
        `File ended ${remaining} bytes short of its advertised length`,
      );
    }

    await sendChunk(socket, chunk.subarray(0, bytesRead));
    position += bytesRead;
    remaining -= bytesRead;
  }
}

async function sendChunk(socket: ITcpSocket, data: Uint8Array): Promise<void> {
  try {
    if (socket.sendAndWait) {
      await socket.sendAndWait(data);
      return;
    }
    socket.send(data);
  } catch (err) {
    throw new TransportError("Socket write failed", { cause: err });
  }
}
