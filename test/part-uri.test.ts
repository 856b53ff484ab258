import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { normalizePartUri, partUriFromItemName } from '../src/index.js';
import { partExtension } from '../src/package/partUri.js';

test('part names are the item name behind a slash, percent-decoded', () => {
  assert.equal(partUriFromItemName('AppxManifest.xml'), '/AppxManifest.xml');
  assert.equal(partUriFromItemName('Assets/Store%20Logo.png'), '/Assets/Store Logo.png');
  assert.equal(partUriFromItemName('Assets\\Logo.png'), '/Assets/Logo.png');
});

test('malformed percent escapes are kept as written', () => {
  assert.equal(partUriFromItemName('bad%zz.txt'), '/bad%zz.txt');
});

test('normalized names ignore case and a missing leading slash', () => {
  assert.equal(normalizePartUri('AppxManifest.XML'), '/appxmanifest.xml');
  assert.equal(normalizePartUri('/A%20B.txt'), '/a b.txt');
});

test('extension comes from the last segment only', () => {
  assert.equal(partExtension('/Assets/Logo.PNG'), 'png');
  assert.equal(partExtension('/dir.d/README'), '');
  assert.equal(partExtension('/archive.tar.gz'), 'gz');
});

test('property: item names without escapes map to themselves behind a slash', () => {
  fc.assert(
    fc.property(fc.stringMatching(/^[A-Za-z0-9_.-]+(\/[A-Za-z0-9_.-]+)*$/), (name) => {
      assert.equal(partUriFromItemName(name), `/${name}`);
      assert.equal(normalizePartUri(partUriFromItemName(name)), `/${name.toLowerCase()}`);
    }),
    { numRuns: 200, seed: 0x5eedc0de }
  );
});
