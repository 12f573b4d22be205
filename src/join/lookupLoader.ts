import { type FileHandle, open } from 'fs/promises';
import { SecondaryFileUnreadableError } from '../errors';
import { parseTsvStream } from '../parsers/tsvParser';
import type { JoinConfig } from '../types/config';
import type { LookupResult } from '../types/tsv';
import { joinKey, pickFields } from './fields';
import { prefixHeader } from './header';

/**
 * Read the whole secondary file into a join key -> kept values table.
 *
 * With header mode on, the first row supplies the header names and is not
 * stored. Later rows with an existing key replace the earlier value.
 * Short rows are not an error: missing fields read as ''.
 */
export async function loadLookupTable(config: JoinConfig): Promise<LookupResult> {
  const filePath = config.secondaryPath;
  if (!filePath) {
    throw new SecondaryFileUnreadableError('');
  }

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    throw new SecondaryFileUnreadableError(filePath, err);
  }

  const table = new Map<string, string>();
  let header = 'NA';

  try {
    const rowCount = await parseTsvStream(handle.createReadStream({ encoding: 'utf-8', autoClose: false }), (row, lineNumber) => {
      const kept = pickFields(row, config.keepColumns).join('\t');

      if (config.includeHeader && lineNumber === 1) {
        header = kept;
        return;
      }
      table.set(joinKey(row, config.secondKeyColumns), kept);
    });

    if (config.verbose) {
      console.error(`[Lookup] Loaded ${table.size} key(s) from ${rowCount} row(s) of ${filePath}`);
    }

    return { table, header, rowCount };
  } catch (err) {
    throw new SecondaryFileUnreadableError(filePath, err);
  } finally {
    await handle.close();
  }
}

/**
 * Apply `--prefixSecondHeader` to a loaded header.
 */
export function prepareLookup(result: LookupResult, config: JoinConfig): LookupResult {
  if (!config.prefixSecondHeader) return result;
  return { ...result, header: prefixHeader(result.header, config.prefixSecondHeader) };
}
