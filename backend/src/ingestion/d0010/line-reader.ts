import type { Readable } from 'node:stream';
import { TextDecoder } from 'node:util';

/**
 * Yield the lines of a byte stream in order, decoding strictly as UTF-8.
 *
 * Invalid byte sequences throw from the decoder (code
 * ERR_ENCODING_INVALID_ENCODED_DATA) instead of being replaced, so a
 * mis-encoded file fails as a whole. A leading BOM is dropped. Both LF and
 * CRLF endings are accepted.
 */
export async function* readLines(stream: Readable): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let pending = '';

  for await (const chunk of stream) {
    pending += decodeChunk(decoder, chunk);

    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      yield stripCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }

  pending += decoder.decode();
  if (pending) {
    yield stripCarriageReturn(pending);
  }
}

function decodeChunk(decoder: TextDecoder, chunk: unknown): string {
  if (typeof chunk === 'string') {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return decoder.decode(chunk, { stream: true });
  }
  throw new TypeError(`Unsupported stream chunk type: ${typeof chunk}`);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
