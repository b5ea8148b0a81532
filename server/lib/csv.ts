import Papa from 'papaparse';

export interface CsvTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Parse CSV text with a header row. Cells stay strings; empty lines are dropped.
 * Header names are trimmed, and rows are filled so every column has a value.
 */
export function parseCsv(text: string): CsvTable {
  const parsed = Papa.parse<Record<string, string>>(stripBom(String(text || '')), {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });
  const columns = (parsed.meta.fields || []).filter((field) => field.length > 0);
  const rows = (parsed.data || []).filter(Boolean).map((raw) => {
    const row: Record<string, string> = {};
    for (const column of columns) {
      const value = raw[column];
      row[column] = typeof value === 'string' ? value : '';
    }
    return row;
  });
  return { columns, rows };
}

/**
 * The header row exactly as written, cells trimmed. parseCsv renames repeated
 * headers (`a`, `a_1`), so callers that must reject repeats read this instead.
 */
export function parseCsvHeader(text: string): string[] {
  const parsed = Papa.parse<string[]>(stripBom(String(text || '')), {
    header: false,
    preview: 1,
    skipEmptyLines: 'greedy',
  });
  const first = parsed.data[0] ?? [];
  return first.map((cell) => String(cell ?? '').trim());
}

/** Serialize rows in the given column order. Missing cells are written empty. */
export function toCsv(columns: string[], rows: Array<Record<string, string | number | null | undefined>>): string {
  const data = rows.map((row) =>
    columns.map((column) => {
      const value = row[column];
      return value === null || value === undefined ? '' : String(value);
    }),
  );
  return `${Papa.unparse({ fields: columns, data }, { newline: '\n' })}\n`;
}
