#!/usr/bin/env node

import { Command } from 'commander';
import { parseFailOnUnsupported, parseMaxFiles, pathOption } from './cli/args';
import { loadAnalyzerConfig } from './config/analyzerConfig';
import { analyzeProject } from './core/analyzeProject';
import { writeModelJsonFile } from './model/serializeModel';
import { formatParseEvent } from './parse/events';
import type { ParseEventSink } from './parse/events';
import { parseOrchestrationFile } from './parse/orchestrationParser';
import { formatRecommendation } from './report/gapReport';
import { writeReportFile } from './report/writeReport';
import { errorMessage } from './util/errors';
import { TOOL_NAME, VERSION } from './version';

function log(line: string): void {
  // eslint-disable-next-line no-console
  console.log(line);
}

function eventLogger(verbose: boolean): ParseEventSink | undefined {
  return verbose ? (e) => log(formatParseEvent(e)) : undefined;
}

export type AnalyzeCliOptions = {
  source?: string;
  json?: string;
  report?: string;
  config?: string;
  exclude: string[];
  maxFiles?: number;
  failOnUnsupported: boolean;
  verbose: boolean;
};

export async function runAnalyze(opts: AnalyzeCliOptions): Promise<number> {
  if (!opts.source) {
    // eslint-disable-next-line no-console
    console.error('Missing required option: --source <dir>');
    return 1;
  }

  const config = opts.config ? await loadAnalyzerConfig(opts.config) : undefined;
  const { report, unsupportedCount } = await analyzeProject({
    sourceRoot: opts.source,
    config,
    excludeGlobs: opts.exclude,
    maxFiles: opts.maxFiles,
    onEvent: eventLogger(opts.verbose),
  });

  if (opts.json) await writeReportFile(opts.json, report, 'json');
  if (opts.report) await writeReportFile(opts.report, report, 'md');

  if (opts.verbose) {
    log(
      `Analyzed ${report.filesAnalyzed} file(s): ${report.filesParsed} parsed, ${report.filesFailed} failed, ` +
        `${unsupportedCount} unsupported shape type(s).`,
    );
    for (const r of report.recommendations) log(formatRecommendation(r));
    if (opts.json) log(`Wrote JSON report: ${opts.json}`);
    if (opts.report) log(`Wrote report: ${opts.report}`);
  }

  if (opts.failOnUnsupported && unsupportedCount > 0) return 3;
  return 0;
}

export type ParseCliOptions = {
  file?: string;
  out?: string;
  verbose: boolean;
};

export async function runParse(opts: ParseCliOptions): Promise<number> {
  if (!opts.file || !opts.out) {
    // eslint-disable-next-line no-console
    console.error('Missing required options: --file <odx> and --out <file>');
    return 1;
  }
  const model = await parseOrchestrationFile(opts.file, { onEvent: eventLogger(opts.verbose) });
  await writeModelJsonFile(opts.out, model);
  if (opts.verbose) {
    log(`Parsed '${model.fullName}': ${model.arena.all().length} shape(s). Wrote: ${opts.out}`);
  }
  return 0;
}

type RawAnalyzeOptions = {
  source?: string;
  json?: string;
  report?: string;
  config?: string;
  exclude?: string[];
  maxFiles?: string;
  failOnUnsupported?: string | boolean;
  verbose?: boolean;
};

type RawParseOptions = {
  file?: string;
  out?: string;
  verbose?: boolean;
};

export async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Parse orchestration designer files into a typed model and report migration gaps')
    .version(VERSION);

  program
    .command('analyze')
    .description('Analyze every orchestration file under a folder and report migration gaps.')
    .option('--source <dir>', 'Root directory to analyze')
    .option('--json <file>', 'Write the gap report as deterministic JSON')
    .option('--report <file>', 'Write the gap report as Markdown')
    .option('--config <file>', 'Analyzer configuration (JSON)')
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--max-files <n>', 'Safety cap for huge folders (default no cap)')
    .option('--fail-on-unsupported [bool]', 'Exit 3 if unsupported shapes were found (true or false; bare flag is true)')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawAnalyzeOptions) => {
      exitCode = await runAnalyze({
        source: pathOption(raw.source),
        json: pathOption(raw.json),
        report: pathOption(raw.report),
        config: pathOption(raw.config),
        exclude: raw.exclude ?? [],
        maxFiles: parseMaxFiles(raw.maxFiles),
        failOnUnsupported: parseFailOnUnsupported(raw.failOnUnsupported),
        verbose: Boolean(raw.verbose),
      });
    });

  program
    .command('parse')
    .description('Parse one orchestration file and write its model as deterministic JSON.')
    .option('--file <odx>', 'Orchestration file to parse')
    .option('--out <file>', 'Output model JSON file')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawParseOptions) => {
      exitCode = await runParse({ file: pathOption(raw.file), out: pathOption(raw.out), verbose: Boolean(raw.verbose) });
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(errorMessage(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(errorMessage(e));
      process.exitCode = 2;
    });
}
