// CHANGE: Build blob URLs for match hyperlinks and encoded API paths.
// WHY: Paths such as `docs/#notes.md` or `a b?.txt` would otherwise end the URL path early.

/**
 * Encode a slash-separated path for use inside a URL path, keeping the separators.
 *
 * @example
 * ```typescript
 * encodePath("docs/#notes.md"); // "docs/%23notes.md"
 * ```
 */
export function encodePath(value: string): string {
  return value
    .split("/")
    .map(segment => encodeURIComponent(segment))
    .join("/");
}

/**
 * Browser URL of a file at a given ref.
 */
export function blobUrl(host: string, owner: string, name: string, ref: string, path: string): string {
  return `https://${host}/${owner}/${name}/blob/${encodePath(ref)}/${encodePath(path)}`;
}
