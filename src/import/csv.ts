/**
 * CSV rows for the bulk importer.
 *
 * One record per line: quoted fields may hold commas and doubled quotes,
 * but not line breaks.
 */

/**
 * Split one line into raw fields.
 *
 * @example parseCsvLine('a,"b, c","say ""hi"""') // ['a', 'b, c', 'say "hi"']
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (ch === '"') {
      if (inQuotes && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (ch === ',' && !inQuotes) {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  fields.push(current);
  return fields;
}

/**
 * Parse CSV text into rows of path segments.
 *
 * Blank lines are skipped; fields are trimmed and lowercased, empty fields
 * dropped, and rows left without fields dropped.
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];

  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === '') continue;

    const segments = parseCsvLine(line)
      .map((field) => field.trim().toLowerCase())
      .filter((field) => field.length > 0);

    if (segments.length > 0) {
      rows.push(segments);
    }
  }

  return rows;
}
