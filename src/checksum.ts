const POLYNOMIAL = 0xedb88320;

const TABLE = Uint32Array.from({ length: 256 }, (_, index) => {
  let value = index;
  for (let bit = 0; bit < 8; bit += 1) {
    value = value & 1 ? (value >>> 1) ^ POLYNOMIAL : value >>> 1;
  }
  return value >>> 0;
});

/** Incremental CRC-32 (IEEE), as recorded in ZIP headers. */
export class Crc32 {
  private state = ~0;

  update(chunk: Uint8Array): this {
    let state = this.state;
    for (const byte of chunk) {
      state = (state >>> 8) ^ (TABLE[(state ^ byte) & 0xff] ?? 0);
    }
    this.state = state;
    return this;
  }

  digest(): number {
    return ~this.state >>> 0;
  }
}

export function crc32(bytes: Uint8Array): number {
  return new Crc32().update(bytes).digest();
}
