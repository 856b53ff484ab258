import test from 'node:test';
import assert from 'node:assert/strict';
import { Crc32, crc32 } from '../src/checksum.js';
import { StreamSizeError, readAllBytes } from '../src/streams/buffer.js';
import { readableFromAsyncIterable } from '../src/streams/adapters.js';

const encoder = new TextEncoder();

test('crc32 matches the standard check value', () => {
  assert.equal(crc32(encoder.encode('123456789')), 0xcbf43926);
  assert.equal(crc32(new Uint8Array(0)), 0);
});

test('incremental crc32 equals the one-shot value', () => {
  const data = encoder.encode('The quick brown fox jumps over the lazy dog');
  const crc = new Crc32();
  crc.update(data.subarray(0, 10));
  crc.update(data.subarray(10));
  assert.equal(crc.digest(), crc32(data));
  assert.equal(crc.digest(), 0x414fa339);
});

async function* chunks(): AsyncGenerator<Uint8Array> {
  yield new Uint8Array([1, 2]);
  yield new Uint8Array(0);
  yield new Uint8Array([3, 4, 5]);
}

test('readAllBytes concatenates chunks', async () => {
  const bytes = await readAllBytes(readableFromAsyncIterable(chunks()));
  assert.deepEqual([...bytes], [1, 2, 3, 4, 5]);
});

test('readAllBytes stops at maxBytes', async () => {
  await assert.rejects(readAllBytes(readableFromAsyncIterable(chunks()), { maxBytes: 4 }), (err: unknown) => {
    assert.ok(err instanceof StreamSizeError);
    assert.equal(err.maxBytes, 4n);
    return true;
  });
});
