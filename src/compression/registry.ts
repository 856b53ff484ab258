import { debugZip } from '../log.js';
import { DEFLATE_CODEC, STORE_CODEC } from './codecs.js';
import type { ZipCompressionCodec } from './types.js';

const registry = new Map<number, ZipCompressionCodec>();
let builtinsReady = false;

/** Makes `codec` the decoder for its method id. */
export function registerCompressionCodec(codec: ZipCompressionCodec): void {
  registry.set(codec.methodId, codec);
}

export function getCompressionCodec(methodId: number): ZipCompressionCodec | undefined {
  return registry.get(methodId);
}

export function listCompressionCodecs(): ZipCompressionCodec[] {
  return Array.from(registry.values());
}

/**
 * Adds store and deflate on the first call. Every reader calls it on open;
 * codecs a caller registered for those ids beforehand stay in place.
 */
export function ensureBuiltinCodecs(): void {
  if (builtinsReady) return;
  builtinsReady = true;
  for (const codec of [STORE_CODEC, DEFLATE_CODEC]) {
    if (!registry.has(codec.methodId)) registry.set(codec.methodId, codec);
  }
  debugZip('codecs ready: %o', listCompressionCodecs().map(({ name }) => name));
}
