// Filename sanitization for stored blobs.
//
// Folds to ASCII, turns whitespace and path separators into underscores, drops
// every character outside [A-Za-z0-9_.-] and trims leading/trailing dots and
// underscores. The result is always a single path segment, or empty.

const DISALLOWED_CHARS = /[^A-Za-z0-9_.-]/g;
const EDGE_DOTS_AND_UNDERSCORES = /^[._]+|[._]+$/g;
const NON_ASCII = /[^\x00-\x7f]/g;

export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(NON_ASCII, '');
  const joined = ascii
    .replace(/[/\\]/g, ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join('_');
  return joined.replace(DISALLOWED_CHARS, '').replace(EDGE_DOTS_AND_UNDERSCORES, '');
}

/** True when `filename` is non-empty and already in sanitized form. */
export function isSanitizedFilename(filename: string): boolean {
  return filename.length > 0 && sanitizeFilename(filename) === filename;
}
