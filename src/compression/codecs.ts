import { Duplex } from 'node:stream';
import { createInflateRaw } from 'node:zlib';
import type { ZipCompressionCodec, ZipCompressionStream } from './types.js';

/** Exposes a zlib transform through the web stream pair codecs return. */
function fromZlib(transform: Duplex): ZipCompressionStream {
  const pair = Duplex.toWeb(transform);
  return { readable: pair.readable, writable: pair.writable };
}

export const STORE_CODEC: ZipCompressionCodec = {
  methodId: 0,
  name: 'store',
  createDecompressStream: () => new TransformStream<Uint8Array, Uint8Array>()
};

export const DEFLATE_CODEC: ZipCompressionCodec = {
  methodId: 8,
  name: 'deflate',
  createDecompressStream: () => fromZlib(createInflateRaw())
};
