import { parse, type Parser } from 'csv-parse';
import type { Readable } from 'stream';
import type { Row, RowCallback } from '../types/tsv';

/**
 * Create a csv-parse parser for plain tab-separated records.
 *
 * Records end at '\n' only and tab is the only delimiter. There is no quoting
 * or escaping, so a quote or a lone '\r' inside a field is plain content.
 * Rows may have any number of fields and empty lines are kept.
 */
export function createTsvParser(): Parser {
  return parse({
    delimiter: '\t',
    record_delimiter: '\n',
    quote: false,
    skip_empty_lines: false,
    trim: false,
    relax_column_count: true,
    relax_quotes: true,
  });
}

function isRow(value: unknown): value is Row {
  return Array.isArray(value) && value.every(field => typeof field === 'string');
}

/**
 * Drop the '\r' of a CRLF line ending. An empty line has no fields.
 */
function normalizeRow(row: Row): Row {
  const last = row.length - 1;
  const fields = last >= 0 && row[last].endsWith('\r') ? [...row.slice(0, last), row[last].slice(0, -1)] : row;
  return fields.length === 1 && fields[0] === '' ? [] : fields;
}

/**
 * Parse a TSV stream row by row, awaiting `onRow` before the next row is read.
 * Resolves with the number of rows seen.
 */
export async function parseTsvStream(stream: Readable, onRow: RowCallback): Promise<number> {
  const parser = createTsvParser();

  stream.on('error', (err: Error) => {
    parser.destroy(err);
  });

  const records: AsyncIterable<unknown> = stream.pipe(parser);
  let lineNumber = 0;

  for await (const record of records) {
    lineNumber++;
    if (!isRow(record)) {
      throw new Error(`Unexpected record at line ${lineNumber}`);
    }
    await onRow(normalizeRow(record), lineNumber);
  }

  return lineNumber;
}

/**
 * Parse an entire TSV stream into an array (use for small inputs only)
 */
export async function parseTsv(stream: Readable): Promise<Row[]> {
  const rows: Row[] = [];
  await parseTsvStream(stream, row => {
    rows.push(row);
  });
  return rows;
}
