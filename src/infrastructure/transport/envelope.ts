import { TransportError } from './types.js';

/**
 * Connect streaming framing.
 *
 * Every message on a streaming call is prefixed with five bytes:
 * one flags byte followed by the payload length as a big-endian uint32.
 */
export const FLAG_COMPRESSED = 0b01;
export const FLAG_END_STREAM = 0b10;

const PREFIX_BYTES = 5;

export interface Envelope {
  flags: number;
  data: Uint8Array;
}

export function encodeEnvelope(flags: number, data: Uint8Array): Uint8Array {
  const out = new Uint8Array(PREFIX_BYTES + data.byteLength);
  const view = new DataView(out.buffer);
  view.setUint8(0, flags);
  view.setUint32(1, data.byteLength, false);
  out.set(data, PREFIX_BYTES);
  return out;
}

/**
 * Splits a byte stream into envelopes. Chunk boundaries are arbitrary:
 * a prefix or payload may span several chunks.
 *
 * The reader is released when the consumer stops iterating early.
 */
export async function* readEnvelopes(body: ReadableStream<Uint8Array>): AsyncGenerator<Envelope, void, undefined> {
  const reader = body.getReader();
  let buffer: Uint8Array = new Uint8Array(0);
  let done = false;

  try {
    for (;;) {
      while (buffer.byteLength >= PREFIX_BYTES) {
        const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
        const flags = view.getUint8(0);
        const length = view.getUint32(1, false);
        if (buffer.byteLength < PREFIX_BYTES + length) break;

        const data = buffer.slice(PREFIX_BYTES, PREFIX_BYTES + length);
        buffer = buffer.slice(PREFIX_BYTES + length);
        yield { flags, data };
      }

      const chunk = await reader.read();
      if (chunk.done) {
        done = true;
        break;
      }
      buffer = concat(buffer, chunk.value);
    }

    if (buffer.byteLength > 0) {
      throw new TransportError('data_loss', `stream ended with ${buffer.byteLength} bytes of an incomplete envelope`);
    }
  } finally {
    if (!done) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.byteLength === 0) return b;
  const out = new Uint8Array(a.byteLength + b.byteLength);
  out.set(a, 0);
  out.set(b, a.byteLength);
  return out;
}
