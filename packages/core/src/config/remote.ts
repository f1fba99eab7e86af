function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

/**
 * Remote root directory named by a backup URL.
 *
 * `idrive://host/backups/web` and `idrive:///backups/web` both give
 * `backups/web`; a bare path is taken as-is. Leading slashes are stripped
 * because the utility addresses everything relative to `home/`.
 */
export function remotePathFromUrl(remoteUrl: string): string {
  let path = remoteUrl;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(remoteUrl)) {
    path = new URL(remoteUrl).pathname;
  }
  return decodePath(path.replace(/^\/+/, "")).trimEnd();
}

/** Join remote path segments with single slashes, dropping empty ones. */
export function joinRemote(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split("/"))
    .filter((part) => part !== "")
    .join("/");
}
