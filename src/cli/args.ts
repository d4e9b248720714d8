import { ConfigError } from '../util/errors';

export type CliCommand = 'analyze' | 'parse';

export type CliArgs = {
  command?: CliCommand;
  source?: string;
  file?: string;
  out?: string;
  json?: string;
  report?: string;
  config?: string;
  exclude: string[];
  maxFiles?: number;
  failOnUnsupported: boolean;
  verbose: boolean;
};

function isCommand(a: string | undefined): a is CliCommand {
  return a === 'analyze' || a === 'parse';
}

/** A path option; blank counts as absent. */
export function pathOption(v: string | undefined): string | undefined {
  return v !== undefined && v.trim() !== '' ? v : undefined;
}

/** `--max-files <n>`: a positive integer, or absent for no cap. */
export function parseMaxFiles(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1) throw new ConfigError(`--max-files must be a positive integer, got '${v}'`);
  return n;
}

/** `--fail-on-unsupported [bool]`: bare flag means true. */
export function parseFailOnUnsupported(v: string | boolean | undefined): boolean {
  if (v === undefined) return false;
  if (typeof v === 'boolean') return v;
  const s = v.trim().toLowerCase();
  if (s === 'true') return true;
  if (s === 'false') return false;
  throw new ConfigError(`--fail-on-unsupported takes true or false, got '${v}'`);
}

/**
 * Minimal, testable CLI arg parsing. Commander handles the full UX; tests use this
 * to check the command word and options.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const out: CliArgs = { exclude: [], failOnUnsupported: false, verbose: false };
  let i = 0;
  const first = argv[0];
  if (isCommand(first)) {
    out.command = first;
    i = 1;
  }
  for (; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--source' || a === '-s') out.source = pathOption(argv[++i]);
    else if (a === '--file' || a === '-f') out.file = pathOption(argv[++i]);
    else if (a === '--out' || a === '-o') out.out = pathOption(argv[++i]);
    else if (a === '--json') out.json = pathOption(argv[++i]);
    else if (a === '--report') out.report = pathOption(argv[++i]);
    else if (a === '--config') out.config = pathOption(argv[++i]);
    else if (a === '--exclude') {
      const glob = argv[++i];
      if (glob !== undefined) out.exclude.push(glob);
    } else if (a === '--max-files') out.maxFiles = parseMaxFiles(argv[++i]);
    else if (a === '--fail-on-unsupported') {
      const next = argv[i + 1];
      const value = next === 'true' || next === 'false' ? next : undefined;
      if (value !== undefined) i++;
      out.failOnUnsupported = parseFailOnUnsupported(value ?? true);
    } else if (a === '--verbose' || a === '-v') out.verbose = true;
  }
  return out;
}
