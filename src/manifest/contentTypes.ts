/** Content type of the application manifest part (`AppxManifest.xml`). */
export const APPX_MANIFEST_CONTENT_TYPE = 'application/vnd.ms-appx.manifest+xml';

/** Content type of the bundle manifest part (`AppxMetadata/AppxBundleManifest.xml`). */
export const APPX_BUNDLE_MANIFEST_CONTENT_TYPE = 'application/vnd.ms-appx.bundlemanifest+xml';
