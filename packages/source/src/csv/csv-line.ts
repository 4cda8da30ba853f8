/**
 * Split a single CSV line into fields
 *
 * Double-quoted fields may contain commas and `""` escapes. Quoted fields
 * spanning several physical lines are not supported.
 *
 * @returns The fields, or null when a quote is left open
 */
export function splitCsvLine(line: string): string[] | null {
  const fields: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    if (inQuotes) {
      if (char !== '"') {
        field += char;
      } else if (line.charAt(i + 1) === '"') {
        field += '"';
        i++;
      } else {
        inQuotes = false;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(field);
      field = '';
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    return null;
  }

  fields.push(field);
  return fields;
}
