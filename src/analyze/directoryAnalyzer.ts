import path from 'node:path';
import type { ParseEventSink } from '../parse/events';
import { createEmptyReport, finalizeReport } from '../report/gapReport';
import type { GapReport } from '../report/gapReport';
import { addExample, incCount } from '../report/reportBuilder';
import { scanOrchestrationFiles } from '../scan/sourceScanner';
import { TOOL_NAME, VERSION } from '../version';
import { FileAnalysis, analyzeFile } from './fileAnalyzer';
import { generateRecommendations } from './recommendations';
import { DEFAULT_CATALOG, ShapeCatalog } from './shapeCatalog';

export const DEFAULT_EXAMPLE_LIMIT = 3;
export const MOST_COMPLEX_LIMIT = 10;
const MEDIUM_THRESHOLD = 5;
const COMPLEX_THRESHOLD = 10;

export type AggregateOptions = {
  /** Example files kept per unsupported kind (default 3). */
  exampleLimit?: number;
};

/**
 * Fold per-file results into the directory report: frequency tables, flagged file
 * lists, complexity buckets and recommendations. Failed files only count as failures.
 */
export function aggregateResults(report: GapReport, results: readonly FileAnalysis[], opts: AggregateOptions = {}): GapReport {
  const limit = opts.exampleLimit ?? DEFAULT_EXAMPLE_LIMIT;

  for (const r of results) {
    report.files.push(r);
    report.filesAnalyzed++;
    if (!r.parsed) {
      report.filesFailed++;
      continue;
    }
    report.filesParsed++;

    for (const [kind, n] of Object.entries(r.shapeTypeCounts)) incCount(report.shapeTypeFrequency, kind, n);
    for (const kind of r.unsupportedShapes) {
      incCount(report.unsupportedShapeFrequency, kind);
      addExample(report.unsupportedShapeExamples, kind, r.fileName, limit);
    }

    const f = report.filesWith;
    if (r.features.hasCorrelationSets) f.correlation.push(r.fileName);
    if (r.features.hasDynamicPorts) f.dynamicPorts.push(r.fileName);
    if (r.features.hasTransactions) f.transactions.push(r.fileName);
    if (r.features.hasBusinessRules) f.businessRules.push(r.fileName);
    if (r.features.hasCompensation) f.compensation.push(r.fileName);
    if (r.features.hasConvoy) f.convoy.push(r.fileName);
    if (r.patterns.aggregator) f.aggregator.push(r.fileName);
    if (r.patterns.contentBasedRouting) f.contentBasedRouting.push(r.fileName);
    if (r.patterns.scatterGather) f.scatterGather.push(r.fileName);
    if (r.patterns.messageBroker) f.messageBroker.push(r.fileName);

    const kinds = r.shapeTypes.length;
    if (kinds < MEDIUM_THRESHOLD) report.complexity.simple.push(r.fileName);
    else if (kinds < COMPLEX_THRESHOLD) report.complexity.medium.push(r.fileName);
    else report.complexity.complex.push(r.fileName);
  }

  report.mostComplex = report.files
    .filter((r) => r.parsed && r.shapeTypes.length >= COMPLEX_THRESHOLD)
    .sort((a, b) => b.shapeTypes.length - a.shapeTypes.length || a.fileName.localeCompare(b.fileName))
    .slice(0, MOST_COMPLEX_LIMIT)
    .map((r) => ({
      fileName: r.fileName,
      shapeTypeCount: r.shapeTypes.length,
      sizeKb: Math.floor(r.fileSizeBytes / 1024),
      unsupportedShapes: [...r.unsupportedShapes],
    }));

  report.recommendations = generateRecommendations(report);
  return report;
}

export type AnalyzeDirectoryOptions = AggregateOptions & {
  sourceRoot: string;
  /** Default `**\/*.odx`. */
  includeGlobs?: string[];
  excludeGlobs?: string[];
  maxFiles?: number;
  catalog?: ShapeCatalog;
  onEvent?: ParseEventSink;
  /** Checked between files; an abort rejects with the signal's reason. */
  signal?: AbortSignal;
};

/**
 * Analyze every orchestration file under `sourceRoot`, one at a time, in sorted path
 * order. A file that fails to read or parse is recorded and the scan carries on.
 */
export async function analyzeDirectory(opts: AnalyzeDirectoryOptions): Promise<GapReport> {
  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, sourceRoot: opts.sourceRoot });
  const files = await scanOrchestrationFiles({
    sourceRoot: opts.sourceRoot,
    includeGlobs: opts.includeGlobs,
    excludeGlobs: opts.excludeGlobs,
    maxFiles: opts.maxFiles,
  });

  const results: FileAnalysis[] = [];
  for (const rel of files) {
    opts.signal?.throwIfAborted();
    const result = await analyzeFile(path.join(opts.sourceRoot, rel), {
      fileName: rel,
      catalog: opts.catalog ?? DEFAULT_CATALOG,
      onEvent: opts.onEvent,
    });
    opts.onEvent?.({
      type: 'file',
      fileName: rel,
      parsed: result.parsed,
      shapeTypeCount: result.shapeTypes.length,
      error: result.parseError,
    });
    results.push(result);
  }

  aggregateResults(report, results, { exampleLimit: opts.exampleLimit });
  return finalizeReport(report);
}
