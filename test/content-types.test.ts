import test from 'node:test';
import assert from 'node:assert/strict';
import { ContentTypeMap, PackageError } from '../src/index.js';
import { contentTypesXml } from './support/packageFixtures.js';

function hasPackageCode(code: string): (err: unknown) => boolean {
  return (err: unknown) => {
    assert.ok(err instanceof PackageError, `expected PackageError, got ${String(err)}`);
    assert.equal(err.code, code);
    return true;
  };
}

const map = ContentTypeMap.parse(
  contentTypesXml({
    defaults: { XML: 'application/xml', png: 'image/png' },
    overrides: {
      '/AppxManifest.xml': 'application/vnd.ms-appx.manifest+xml',
      '/Docs/Read%20Me.txt': 'text/plain'
    }
  })
);

test('override wins over the extension default', () => {
  assert.equal(map.resolve('/AppxManifest.xml'), 'application/vnd.ms-appx.manifest+xml');
  assert.equal(map.resolve('/Other.xml'), 'application/xml');
});

test('part names and extensions match regardless of ASCII case', () => {
  assert.equal(map.resolve('/appxmanifest.XML'), 'application/vnd.ms-appx.manifest+xml');
  assert.equal(map.resolve('/Assets/LOGO.PNG'), 'image/png');
});

test('override part names are compared percent-decoded', () => {
  assert.equal(map.resolve('/Docs/Read Me.txt'), 'text/plain');
});

test('undeclared parts resolve to nothing', () => {
  assert.equal(map.resolve('/bin/app.exe'), undefined);
  assert.equal(map.resolve('/LICENSE'), undefined);
});

test('namespace prefixes on the declarations are ignored', () => {
  const prefixed = ContentTypeMap.parse(
    '<ct:Types xmlns:ct="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<ct:Default Extension="xml" ContentType="application/xml"/>' +
      '</ct:Types>'
  );
  assert.equal(prefixed.resolve('/a.xml'), 'application/xml');
});

test('a root other than Types makes the container invalid', () => {
  assert.throws(() => ContentTypeMap.parse('<Other/>'), hasPackageCode('PACKAGE_INVALID_CONTAINER'));
});

test('incomplete declarations make the container invalid', () => {
  assert.throws(
    () => ContentTypeMap.parse('<Types><Default Extension="xml"/></Types>'),
    hasPackageCode('PACKAGE_INVALID_CONTAINER')
  );
  assert.throws(
    () => ContentTypeMap.parse('<Types><Override ContentType="text/plain"/></Types>'),
    hasPackageCode('PACKAGE_INVALID_CONTAINER')
  );
});

test('malformed XML is reported as such', () => {
  assert.throws(() => ContentTypeMap.parse('<Types><Default Extension="xml"></Types>'), hasPackageCode('PACKAGE_XML_INVALID'));
});
