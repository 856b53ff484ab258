/** Web stream pair a codec decodes through: compressed bytes in, plain bytes out. */
export type ZipCompressionStream = {
  readable: ReadableStream<Uint8Array>;
  writable: WritableStream<Uint8Array>;
};

/** Decoder for one ZIP compression method. */
export type ZipCompressionCodec = {
  /** Method id as recorded in ZIP headers (0 store, 8 deflate). */
  methodId: number;
  name: string;
  createDecompressStream(): ZipCompressionStream;
};
