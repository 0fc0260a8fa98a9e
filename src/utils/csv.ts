const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Parse CSV text into rows of raw cell values.
 * Supports quoted fields containing commas, doubled quotes and line breaks.
 * Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    row.push(field);
    const blank = row.length === 1 && row[0] === '' && !fieldStarted;
    if (!blank) {
      rows.push(row);
    }
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      fieldStarted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
      fieldStarted = true;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') {
        i++;
      }
      endRow();
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0 || fieldStarted) {
    endRow();
  }

  return rows;
}

export function serializeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function serializeCsvRow(fields: readonly string[]): string {
  return fields.map(serializeCsvField).join(',');
}

/**
 * Serialize a header and rows into file content, always ending with a newline
 */
export function serializeCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map(serializeCsvRow).join('\n') + '\n';
}
