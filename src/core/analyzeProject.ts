import { analyzeDirectory } from '../analyze/directoryAnalyzer';
import { ShapeCatalog } from '../analyze/shapeCatalog';
import type { AnalyzerConfig } from '../config/analyzerConfig';
import type { ParseEventSink } from '../parse/events';
import type { GapReport } from '../report/gapReport';

export type AnalyzeProjectOptions = {
  sourceRoot: string;
  /** Settings from a configuration file; explicit options below win over it. */
  config?: AnalyzerConfig;
  excludeGlobs?: string[];
  maxFiles?: number;
  onEvent?: ParseEventSink;
  signal?: AbortSignal;
};

export type AnalyzeProjectResult = {
  report: GapReport;
  /** Distinct unsupported shape kinds across all parsed files. */
  unsupportedCount: number;
};

/**
 * Core library entrypoint: analyze every orchestration file under a folder.
 *
 * - Does not write files.
 * - Returns the finalized gap report.
 */
export async function analyzeProject(opts: AnalyzeProjectOptions): Promise<AnalyzeProjectResult> {
  const config = opts.config ?? {};
  const catalog = new ShapeCatalog({
    extraSupported: config.extraSupportedShapes,
    extraPartial: config.extraPartialShapes,
  });

  const report = await analyzeDirectory({
    sourceRoot: opts.sourceRoot,
    includeGlobs: config.include,
    excludeGlobs: [...(config.exclude ?? []), ...(opts.excludeGlobs ?? [])],
    maxFiles: opts.maxFiles ?? config.maxFiles,
    exampleLimit: config.exampleLimit,
    catalog,
    onEvent: opts.onEvent,
    signal: opts.signal,
  });

  return { report, unsupportedCount: Object.keys(report.unsupportedShapeFrequency).length };
}
