import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { parseColumnList } from '../join/fields';
import type { JoinConfig } from '../types/config';

const HELP_TEXT = `
Usage: tsv-join [options] <secondary-file> < primary.tsv

Left-outer-joins tab-separated rows from stdin with columns from <secondary-file>.
All column positions are 1-based.

Options:
  --first=<cols>               Join-key columns in the primary file (e.g. 1 or 1,2)
  --second=<cols>              Join-key columns in the secondary file
  --keep=<cols>                Secondary columns to insert (ignored with --fill01)
  --insert=<n>                 Insert new columns before column n (default: after the last)
  --includeHeader              First line of both files is a header
  --prefixFirstHeader=<text>   Prefix primary header fields with "<text>."
  --prefixSecondHeader=<text>  Prefix inserted header fields with "<text>."
  --fill01                     Insert 1 when the key is found and 0 when it is not
  --verbose                    Write progress to stderr
  --version                    Show version number
  --help                       Show this help message

Environment Variables:
  TSV_JOIN_VERBOSE             Same as --verbose when set to "true"

Examples:
  cat a.tsv | tsv-join --first 1 --second 1 --keep 2,3 --insert 2 b.tsv
  cat a.tsv | tsv-join --first 1,2 --second 3,4 --fill01 --includeHeader b.tsv
`.trim();

function readPackageVersion(): string {
  const pkgPath = path.join(__dirname, '..', '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Handle --version and --help flags before config parsing.
 */
export function handleVersionHelp(args: string[]): { handled: boolean; output?: string } {
  const { values } = parseArgs({
    args,
    options: {
      version: { type: 'boolean' },
      help: { type: 'boolean' },
    },
    strict: false,
    allowPositionals: true,
  });

  if (values.help) return { handled: true, output: HELP_TEXT };
  if (values.version) return { handled: true, output: readPackageVersion() };
  return { handled: false };
}

export type ConfigWarning = (message: string) => void;

const STRING_OPTIONS = ['first', 'second', 'keep', 'insert', 'prefixFirstHeader', 'prefixSecondHeader'];
const BOOLEAN_OPTIONS = ['includeHeader', 'fill01', 'verbose'];

/** lower-cased spelling -> canonical option name */
const OPTION_NAMES = new Map([...STRING_OPTIONS, ...BOOLEAN_OPTIONS].map(name => [name.toLowerCase(), name]));

/**
 * Rewrite option spellings into the one form `parseArgs` is given.
 *
 * Option names match case-insensitively and take one or two leading dashes
 * (`-first 1`, `--Fill01`). Values are attached as `--name=value`. Unknown
 * options and options missing their value are reported and dropped.
 */
function normalizeArgs(args: string[], warn: ConfigWarning): string[] {
  const result: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      result.push(...args.slice(i));
      break;
    }

    const match = /^--?([^=]+)(?:=(.*))?$/s.exec(arg);
    if (!match) {
      result.push(arg);
      continue;
    }

    const name = OPTION_NAMES.get(match[1].toLowerCase());
    const inlineValue: string | undefined = match[2];

    if (name === undefined) {
      warn(`[Config] Ignoring unknown option ${arg}`);
    } else if (BOOLEAN_OPTIONS.includes(name)) {
      result.push(`--${name}`);
    } else if (inlineValue !== undefined) {
      result.push(`--${name}=${inlineValue}`);
    } else if (i + 1 < args.length) {
      result.push(`--${name}=${args[i + 1]}`);
      i++;
    } else {
      warn(`[Config] Ignoring option --${name}: no value given`);
    }
  }

  return result;
}

function parseInsert(raw: string | undefined, warn: ConfigWarning): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    warn(`[Config] Ignoring --insert=${raw}: not a column number`);
    return undefined;
  }
  return parseInt(raw, 10) - 1;
}

function readArgs(args: string[], warn: ConfigWarning) {
  return parseArgs({
    args: normalizeArgs(args, warn),
    options: {
      first: { type: 'string' },
      second: { type: 'string' },
      keep: { type: 'string' },
      insert: { type: 'string' },
      includeHeader: { type: 'boolean' },
      prefixFirstHeader: { type: 'string' },
      prefixSecondHeader: { type: 'string' },
      fill01: { type: 'boolean' },
      verbose: { type: 'boolean' },
    },
    strict: true,
    allowPositionals: true,
  });
}

/**
 * Build the join configuration from CLI arguments (without the node/script
 * prefix) and environment.
 *
 * Positions are converted to 0-based here and nowhere else. With --fill01 the
 * kept columns are forced to the first secondary column, so exactly one field
 * is inserted whatever --keep says. Malformed options never stop the join:
 * they are reported through `warn` and left unset.
 */
export function parseConfig(
  args: string[],
  env: Record<string, string | undefined>,
  warn: ConfigWarning = message => console.error(message)
): JoinConfig {
  const { values, positionals } = readArgs(args, warn);
  const fill01 = values.fill01 === true;

  const config: JoinConfig = {
    firstKeyColumns: parseColumnList(values.first),
    secondKeyColumns: parseColumnList(values.second),
    keepColumns: fill01 ? [0] : parseColumnList(values.keep),
    insertAt: parseInsert(values.insert, warn),
    includeHeader: values.includeHeader === true,
    prefixFirstHeader: values.prefixFirstHeader || undefined,
    prefixSecondHeader: values.prefixSecondHeader || undefined,
    fill01,
    secondaryPath: positionals[0],
    verbose: values.verbose === true || env.TSV_JOIN_VERBOSE === 'true',
  };

  return Object.freeze(config);
}
