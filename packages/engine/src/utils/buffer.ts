const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function fromString(value: string): Uint8Array {
  return encoder.encode(value);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function indexOfSequence(
  buffer: Uint8Array,
  sequence: Uint8Array,
  fromIndex = 0,
): number {
  outer: for (let i = fromIndex; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}
