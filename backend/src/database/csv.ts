const NEEDS_QUOTES = /[",\r\n]/;

export function encodeField(value: string): string {
  return NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export const encodeRow = (fields: string[]) => fields.map(encodeField).join(",");

/**
 * Splits CSV text into rows of fields. Quoted fields may hold commas, doubled
 * quotes and line breaks. Lines with nothing on them are dropped.
 * Returns null when a quote is left open at the end of the input.
 */
export function parseCsv(text: string): string[][] | null {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let rowHasContent = false;

  const endRow = () => {
    if (rowHasContent) {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = "";
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
      rowHasContent = true;
    } else if (ch === "\n") {
      endRow();
    } else if (ch !== "\r") {
      field += ch;
      rowHasContent = true;
    }
  }

  if (inQuotes) return null;
  endRow();
  return rows;
}
