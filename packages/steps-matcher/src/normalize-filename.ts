/**
 * File name to NormalizedKey.
 *
 * Two names with the same key are treated as the same logical document:
 * `normalizeFileName('Fåctura 001.pdf') === normalizeFileName('factura-001.PDF')`.
 *
 * Steps, in order:
 * 1. final path segment (either separator)
 * 2. strip one trailing extension; a leading dot is not an extension
 * 3. compatibility-decompose and drop combining marks (accent folding)
 * 4. lower-case
 * 5. every run of characters outside [a-z0-9] becomes a single '-'
 * 6. trim '-' at both ends
 *
 * Total over all strings and idempotent on its own output.
 */
export function normalizeFileName(name: string): string {
  return stripExtension(finalSegment(name))
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function finalSegment(name: string): string {
  const cut = Math.max(name.lastIndexOf('/'), name.lastIndexOf('\\'));
  return cut >= 0 ? name.slice(cut + 1) : name;
}

function stripExtension(segment: string): string {
  const dot = segment.lastIndexOf('.');
  if (dot <= 0 || /^\.+$/.test(segment.slice(0, dot))) {
    return segment;
  }
  return segment.slice(0, dot);
}

/**
 * Extension of the final path segment including the dot, or '' when the
 * name has none. Uses the same rule as the normalizer.
 */
export function fileExtension(name: string): string {
  const segment = finalSegment(name);
  const stem = stripExtension(segment);
  return segment.slice(stem.length);
}
