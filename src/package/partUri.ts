/** Part name for a ZIP item: `/` followed by the percent-decoded item name. */
export function partUriFromItemName(itemName: string): string {
  return `/${percentDecode(itemName.replace(/\\/g, '/'))}`;
}

/** Form used to compare part names, which are equivalent regardless of ASCII case. */
export function normalizePartUri(uri: string): string {
  const decoded = percentDecode(uri);
  return (decoded.startsWith('/') ? decoded : `/${decoded}`).toLowerCase();
}

/** Lower-cased extension of the last segment, or '' when it has none. */
export function partExtension(uri: string): string {
  const segment = uri.slice(uri.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  return dot < 0 ? '' : segment.slice(dot + 1).toLowerCase();
}

function percentDecode(value: string): string {
  if (!value.includes('%')) return value;
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
