#!/usr/bin/env node
import type { Readable, Writable } from 'stream';
import { handleVersionHelp, parseConfig } from './config/joinConfig';
import { describeError, JoinError } from './errors';
import { loadLookupTable, prepareLookup } from './join/lookupLoader';
import { joinStream } from './join/streamJoiner';

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

/**
 * Run one join and return the process exit code.
 *
 * The lookup file is read completely before the first line of stdin, so a
 * missing lookup file fails before anything is written to stdout.
 */
export async function run(args: string[], env: Record<string, string | undefined>, io: CliIO): Promise<number> {
  const versionHelp = handleVersionHelp(args);
  if (versionHelp.handled) {
    io.stdout.write(`${versionHelp.output ?? ''}\n`);
    return 0;
  }

  try {
    const config = parseConfig(args, env, message => io.stderr.write(`${message}\n`));
    const lookup = prepareLookup(await loadLookupTable(config), config);
    const stats = await joinStream(io.stdin, io.stdout, lookup, config);

    if (config.verbose) {
      console.error(
        `[Join] Wrote ${stats.rows} row(s): ${stats.matched} matched, ${stats.unmatched} unmatched` +
          (stats.headerWritten ? ' (plus header)' : '')
      );
    }
    return 0;
  } catch (error) {
    if (error instanceof JoinError) {
      io.stderr.write(`Error: ${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  }
}

export default async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), process.env, {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

if (require.main === module) {
  main().catch(error => {
    console.error(`[Join] Fatal error: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
