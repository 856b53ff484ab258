import createDebug from 'debug';

export const debugZip = createDebug('appx-manifest:zip');
export const debugPackage = createDebug('appx-manifest:package');
export const debugExtract = createDebug('appx-manifest:extract');
