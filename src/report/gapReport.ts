import { stableStringify } from '../util/deterministicJson';
import type { FileAnalysis } from '../analyze/fileAnalyzer';

export type RecommendationPriority = 'P0' | 'P1' | 'P2' | 'P3' | 'P?';

export type Recommendation = {
  priority: RecommendationPriority;
  title: string;
  detail: string;
};

/** Files (by name) for which each directory-level flag fired. */
export type FlaggedFiles = {
  correlation: string[];
  dynamicPorts: string[];
  transactions: string[];
  businessRules: string[];
  compensation: string[];
  convoy: string[];
  aggregator: string[];
  contentBasedRouting: string[];
  scatterGather: string[];
  messageBroker: string[];
};

/** Parsed files grouped by distinct shape kinds: < 5, 5 to 9, 10 and more. */
export type ComplexityBuckets = {
  simple: string[];
  medium: string[];
  complex: string[];
};

export type ComplexFileSummary = {
  fileName: string;
  shapeTypeCount: number;
  sizeKb: number;
  unsupportedShapes: string[];
};

export type GapReport = {
  schema: 'gap-report-v1';
  tool: { name: string; version: string };
  sourceRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesAnalyzed: number;
  filesParsed: number;
  filesFailed: number;
  shapeTypeFrequency: Record<string, number>;
  /** Number of files in which each unsupported kind appears. */
  unsupportedShapeFrequency: Record<string, number>;
  unsupportedShapeExamples: Record<string, string[]>;
  filesWith: FlaggedFiles;
  complexity: ComplexityBuckets;
  mostComplex: ComplexFileSummary[];
  recommendations: Recommendation[];
  files: FileAnalysis[];
};

export function emptyFlaggedFiles(): FlaggedFiles {
  return {
    correlation: [],
    dynamicPorts: [],
    transactions: [],
    businessRules: [],
    compensation: [],
    convoy: [],
    aggregator: [],
    contentBasedRouting: [],
    scatterGather: [],
    messageBroker: [],
  };
}

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  sourceRoot: string;
  startedAtIso?: string;
}): GapReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'gap-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    sourceRoot: args.sourceRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesAnalyzed: 0,
    filesParsed: 0,
    filesFailed: 0,
    shapeTypeFrequency: {},
    unsupportedShapeFrequency: {},
    unsupportedShapeExamples: {},
    filesWith: emptyFlaggedFiles(),
    complexity: { simple: [], medium: [], complex: [] },
    mostComplex: [],
    recommendations: [],
    files: [],
  };
}

export function finalizeReport(report: GapReport, finishedAtIso?: string): GapReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: GapReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}

export function formatRecommendation(r: Recommendation): string {
  return `${r.priority} - ${r.title}: ${r.detail}`;
}
