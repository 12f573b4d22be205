import { once } from 'events';
import type { Readable, Writable } from 'stream';
import { parseTsvStream } from '../parsers/tsvParser';
import type { JoinConfig } from '../types/config';
import type { JoinedLine, JoinStats, LookupResult, Row } from '../types/tsv';
import { joinKey, placeholder, spliceFields } from './fields';

/**
 * Transform one primary line.
 *
 * Line 0 in header mode gets the (optionally prefixed) primary header plus the
 * secondary header. Every other line gets the stored values on a hit and
 * NA placeholders on a miss; in fill01 mode a single 1 or 0 instead.
 */
export function joinLine(fields: Row, lineIndex: number, lookup: LookupResult, config: JoinConfig): JoinedLine {
  if (config.includeHeader && lineIndex === 0) {
    const prefix = config.prefixFirstHeader;
    const headerFields = prefix ? fields.map(field => `${prefix}.${field}`) : fields;
    return { fields: spliceFields(headerFields, config.insertAt, lookup.header), kind: 'header' };
  }

  const keepCount = config.keepColumns.length;
  const stored = lookup.table.get(joinKey(fields, config.firstKeyColumns));

  if (stored === undefined) {
    const value = placeholder(config.fill01 ? '0' : 'NA', keepCount);
    return { fields: spliceFields(fields, config.insertAt, value), kind: 'unmatched' };
  }

  const value = config.fill01 ? placeholder('1', keepCount) : stored;
  return { fields: spliceFields(fields, config.insertAt, value), kind: 'matched' };
}

/**
 * Join every line of `input` against the lookup table and write the result to
 * `output`, one line out per line in, in input order.
 */
export async function joinStream(
  input: Readable,
  output: Writable,
  lookup: LookupResult,
  config: JoinConfig
): Promise<JoinStats> {
  const stats: JoinStats = { rows: 0, matched: 0, unmatched: 0, headerWritten: false };

  await parseTsvStream(input, async (fields, lineNumber) => {
    const joined = joinLine(fields, lineNumber - 1, lookup, config);

    if (joined.kind === 'header') {
      stats.headerWritten = true;
    } else {
      stats.rows++;
      stats[joined.kind]++;
    }

    if (!output.write(joined.fields.join('\t') + '\n')) {
      await once(output, 'drain');
    }
  });

  return stats;
}
