/**
 * Slug helpers
 */

const NON_WORD = /[^\p{L}\p{Nd}]+/gu;
const EDGE_UNDERSCORES = /^_+|_+$/g;

/**
 * Canonical identifier for a label: lowercased and trimmed, every run of
 * characters other than letters and digits collapsed to one underscore,
 * no leading or trailing underscore.
 *
 * @example slugify('  Long Hair!! ') === 'long_hair'
 */
export function slugify(text: string): string {
  return text.toLowerCase().trim().replace(NON_WORD, '_').replace(EDGE_UNDERSCORES, '');
}

/**
 * Display text as stored on a node
 */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Orders text the way SQLite's default BINARY collation does: by UTF-8
 * bytes, which differs from `<` on strings above U+FFFF.
 */
export function compareText(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}
