/**
 * Minimal HTML table reader for holdings pages: first <table>, header from
 * <thead> (or the first row), body rows as trimmed cell text.
 */

export interface HtmlTable {
  headers: string[];
  rows: string[][];
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  nbsp: ' ',
  quot: '"',
  apos: "'",
  lt: '<',
  gt: '>',
};

export function decodeHtml(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function stripTags(html: string): string {
  return decodeHtml(html.replace(/<[^>]+>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

/** Visible text of a page, scripts and styles removed. */
export function pageText(html: string): string {
  return stripTags(String(html || '').replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' '));
}

function rowCells(rowHtml: string): string[] {
  return Array.from(rowHtml.matchAll(/<t[dh][^>]*>([\s\S]*?)<\/t[dh]>/gi)).map((cell) => stripTags(cell[1]));
}

function tableRows(html: string): string[][] {
  return Array.from(html.matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi)).map((row) => rowCells(row[1]));
}

/**
 * Returns null when the page has no table or the table has no data rows.
 * Rows whose first cell is empty or repeats the "Ticker" header are dropped.
 * When data rows are wider than the header, extra columns are named `Column_<i>`.
 */
export function extractHoldingsTable(html: string): HtmlTable | null {
  const tableMatch = String(html || '').match(/<table[^>]*>([\s\S]*?)<\/table>/i);
  if (!tableMatch) return null;
  const tableHtml = tableMatch[1];

  const theadMatch = tableHtml.match(/<thead[^>]*>([\s\S]*?)<\/thead>/i);
  let headers = theadMatch ? rowCells(theadMatch[1]).filter((text) => text.length > 0) : [];
  const tbodyMatch = tableHtml.match(/<tbody[^>]*>([\s\S]*?)<\/tbody>/i);

  let bodyRows: string[][];
  if (tbodyMatch) {
    bodyRows = tableRows(tbodyMatch[1]);
  } else {
    const withoutHead = theadMatch ? tableHtml.replace(theadMatch[0], '') : tableHtml;
    const all = tableRows(withoutHead);
    bodyRows = theadMatch ? all : all.slice(1);
  }
  if (headers.length === 0) {
    const first = tableRows(tableHtml)[0] ?? [];
    headers = first.filter((text) => text.length > 0);
  }

  const rows = bodyRows.filter((cells) => cells.length > 0 && cells[0] !== '' && cells[0].toLowerCase() !== 'ticker');
  if (rows.length === 0) return null;

  if (headers.length > 0 && rows[0].length > headers.length) {
    const width = rows[0].length;
    for (let i = headers.length; i < width; i++) {
      headers.push(`Column_${i}`);
    }
  }
  return { headers, rows };
}

/** Zip cell arrays with headers; missing cells become '' and extra cells are dropped. */
export function rowsToRecords(headers: string[], rows: string[][]): Array<Record<string, string>> {
  return rows.map((cells) => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      record[header] = cells[index] ?? '';
    });
    return record;
  });
}
