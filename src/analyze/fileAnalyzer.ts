import path from 'node:path';
import type { OrchestrationModel } from '../model/orchestration';
import type { ParseEventSink } from '../parse/events';
import { parseOrchestration } from '../parse/orchestrationParser';
import { readSourceFile } from '../source/sourceExtractor';
import { ErrorCode, errorCodeOf, errorMessage } from '../util/errors';
import { incCount, pushUnique } from '../report/reportBuilder';
import {
  FeatureFlags,
  PatternFlags,
  detectFeatures,
  detectPatterns,
  emptyFeatureFlags,
  emptyPatternFlags,
  patternCounts,
} from './patternDetector';
import { ReceivePattern, analyzeReceivePattern, isValidReceivePattern } from './receivePattern';
import { DEFAULT_CATALOG, ShapeCatalog } from './shapeCatalog';
import { collectShapes } from './shapeWalker';

export type ReceivePatternSummary = {
  pattern: ReceivePattern;
  /** Names of the receives involved, primary first. */
  receives: string[];
  valid: boolean;
  requiresSessionSupport: boolean;
  requiresRequestTrigger: boolean;
  requiresTimeoutHandling: boolean;
};

/** Per-file result record. */
export type FileAnalysis = {
  fileName: string;
  fileSizeBytes: number;
  parsed: boolean;
  parseError?: string;
  errorCode?: ErrorCode;
  /** `namespace.name` of the orchestration. */
  orchestration?: string;
  /** Distinct shape kinds in visit order. */
  shapeTypes: string[];
  shapeTypeCounts: Record<string, number>;
  unsupportedShapes: string[];
  partiallySupportedShapes: string[];
  warnings: string[];
  features: FeatureFlags;
  patterns: PatternFlags;
  portCount: number;
  messageCount: number;
  correlationSetCount: number;
  receivePattern?: ReceivePatternSummary;
};

export type AnalyzeFileOptions = {
  catalog?: ShapeCatalog;
  onEvent?: ParseEventSink;
};

export function emptyAnalysis(fileName: string, fileSizeBytes: number): FileAnalysis {
  return {
    fileName,
    fileSizeBytes,
    parsed: false,
    shapeTypes: [],
    shapeTypeCounts: {},
    unsupportedShapes: [],
    partiallySupportedShapes: [],
    warnings: [],
    features: emptyFeatureFlags(),
    patterns: emptyPatternFlags(),
    portCount: 0,
    messageCount: 0,
    correlationSetCount: 0,
  };
}

function failed(fileName: string, fileSizeBytes: number, e: unknown): FileAnalysis {
  const out = emptyAnalysis(fileName, fileSizeBytes);
  out.parseError = errorMessage(e);
  const code = errorCodeOf(e);
  if (code) out.errorCode = code;
  return out;
}

/** Analyze an already parsed orchestration. Never mutates the model. */
export function analyzeModel(
  model: OrchestrationModel,
  fileName: string,
  fileSizeBytes: number,
  catalog: ShapeCatalog = DEFAULT_CATALOG,
): FileAnalysis {
  const out = emptyAnalysis(fileName, fileSizeBytes);
  out.parsed = true;
  out.orchestration = model.fullName;

  const shapes = collectShapes(model);
  for (const s of shapes) {
    pushUnique(out.shapeTypes, s.shapeType);
    incCount(out.shapeTypeCounts, s.shapeType);
    const support = catalog.classify(s.shapeType);
    if (support === 'unsupported') pushUnique(out.unsupportedShapes, s.shapeType);
    else if (support === 'partial') pushUnique(out.partiallySupportedShapes, s.shapeType);
  }

  out.features = detectFeatures(model, shapes);
  out.portCount = model.ports.length;
  out.messageCount = model.messages.length;
  out.correlationSetCount = shapes.filter((s) => s.kind === 'correlationDeclaration').length;
  if (out.correlationSetCount > 0) out.features.hasCorrelationSets = true;
  out.patterns = detectPatterns(patternCounts(shapes), out.features.hasCorrelationSets);

  const rp = analyzeReceivePattern(model);
  const handles = rp.primaryReceive === undefined ? rp.secondaryReceives : [rp.primaryReceive, ...rp.secondaryReceives];
  out.receivePattern = {
    pattern: rp.pattern,
    receives: handles.map((h) => model.arena.get(h).name),
    valid: isValidReceivePattern(rp),
    requiresSessionSupport: rp.requiresSessionSupport,
    requiresRequestTrigger: rp.requiresRequestTrigger,
    requiresTimeoutHandling: rp.requiresTimeoutHandling,
  };
  out.warnings.push(...rp.warnings);
  if (rp.migrationError) out.warnings.push(rp.migrationError);
  return out;
}

/** Parse and analyze raw file text; a parse failure is recorded, not thrown. */
export function analyzeSource(raw: string, fileName: string, opts: AnalyzeFileOptions = {}): FileAnalysis {
  const size = Buffer.byteLength(raw, 'utf8');
  let model: OrchestrationModel;
  try {
    model = parseOrchestration(raw, { fileLabel: fileName, onEvent: opts.onEvent });
  } catch (e) {
    return failed(fileName, size, e);
  }
  return analyzeModel(model, fileName, size, opts.catalog);
}

export async function analyzeFile(
  filePath: string,
  opts: AnalyzeFileOptions & { fileName?: string } = {},
): Promise<FileAnalysis> {
  const fileName = opts.fileName ?? path.basename(filePath);
  let text: string;
  let size: number;
  try {
    const source = await readSourceFile(filePath);
    text = source.text;
    size = source.sizeBytes;
  } catch (e) {
    return failed(fileName, 0, e);
  }
  const result = analyzeSource(text, fileName, opts);
  result.fileSizeBytes = size;
  return result;
}
