/** One row of an `--auth-list` reply. */
export interface RemoteEntry {
  size: number;
  name: string;
}

/**
 * Parse one listing line. Data lines start with `[` and hold bracketed
 * columns; the name is the last column and the size the second, or the
 * first when the row carries nothing but size and name:
 *
 *   [-rw-r--r--] [4096] [2024/05/01 10:00:00] [backups/web/a.gpg]
 *   [12345][  ][foo/bar.gpg]
 *
 * Returns null for anything else (progress text, headers, rows without a
 * numeric size).
 */
export function parseListingLine(line: string): RemoteEntry | null {
  if (!line.startsWith("[")) return null;

  const columns = line
    .split(/\[|\]/)
    .map((column) => column.trim())
    .filter((column) => column !== "");
  if (columns.length < 2) return null;

  const name = columns[columns.length - 1];
  const fields = columns.slice(0, -1);
  const sizeColumn = fields.length >= 2 ? fields[1] : fields[0];
  if (!/^\d+$/.test(sizeColumn)) return null;

  return { size: Number(sizeColumn), name };
}

export function parseListing(raw: string): RemoteEntry[] {
  const entries: RemoteEntry[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const entry = parseListingLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}
