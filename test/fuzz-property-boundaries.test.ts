import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { PackageError, extractFromBundle, extractFromPackage, extractManifest } from '../src/index.js';
import { attribute, childElements } from '../src/xml/parse.js';
import { buildBundle, buildPackage, manifestXml } from './support/packageFixtures.js';

const PROPERTY_CONFIG = {
  numRuns: 60,
  seed: 0x5eedc0de
} as const;

const identityNameArbitrary = fc.stringMatching(/^[A-Za-z][A-Za-z0-9]{0,15}(\.[A-Za-z0-9]{1,15}){0,3}$/);

test('property: package extraction returns the stored identity', async () => {
  await fc.assert(
    fc.asyncProperty(identityNameArbitrary, fc.constantFrom<'store' | 'deflate'>('store', 'deflate'), async (name, method) => {
      const document = await extractFromPackage(buildPackage({ manifest: manifestXml(name), method }));
      const [identity] = childElements(document.root, 'Identity');
      assert.ok(identity);
      assert.equal(attribute(identity, 'Name'), name);
    }),
    PROPERTY_CONFIG
  );
});

test('property: bundle extraction picks the first application entry', async () => {
  await fc.assert(
    fc.asyncProperty(
      fc.array(fc.constantFrom('application', 'resource'), { minLength: 1, maxLength: 5 }),
      async (types) => {
        const packages = types.map((type, index) => ({
          type,
          fileName: `Pkg${index}.appx`,
          data: buildPackage({ manifest: manifestXml(`Pkg${index}`) })
        }));
        const expected = types.indexOf('application');
        if (expected < 0) {
          await assert.rejects(
            extractFromBundle(buildBundle({ packages })),
            (err: unknown) => err instanceof PackageError && err.code === 'PACKAGE_MAIN_PACKAGE_NOT_FOUND'
          );
          return;
        }
        const document = await extractManifest(buildBundle({ packages }));
        assert.equal(document.packageFileName, `Pkg${expected}.appx`);
      }
    ),
    { numRuns: 30, seed: 0x5eedcafe }
  );
});

test('property: corrupted packages fail only with PackageError', async () => {
  const base = buildPackage();
  await fc.assert(
    fc.asyncProperty(
      fc.integer({ min: 0, max: base.length - 1 }),
      fc.integer({ min: 1, max: 255 }),
      fc.boolean(),
      async (position, xor, truncate) => {
        const mutated = truncate ? base.slice(0, position) : base.slice();
        if (!truncate) mutated[position] = (mutated[position] ?? 0) ^ xor;
        try {
          await extractFromPackage(mutated);
        } catch (err) {
          assert.ok(err instanceof PackageError, `unexpected ${String(err)}`);
        }
      }
    ),
    { numRuns: 200, seed: 0x5eedf00d }
  );
});
