/**
 * Reduces a client-supplied filename to a safe, flat ASCII name:
 * path separators become spaces, everything outside `[A-Za-z0-9_.-]` is
 * dropped, whitespace runs collapse to `_`, and leading/trailing dots and
 * underscores are trimmed. May return an empty string.
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename
    .normalize('NFKD')
    .replace(/[^\x20-\x7e]/g, '')
    .replace(/[/\\]/g, ' ');

  return ascii
    .trim()
    .split(/\s+/)
    .join('_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

/** Lower-cased text after the last dot, or `''` when there is none. */
export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot < 0 || dot === filename.length - 1) return '';
  return filename.slice(dot + 1).toLowerCase();
}
