// Public library surface.

export { TOOL_NAME, VERSION } from './version';

export * from './util/errors';
export * from './model/orchestration';
export * from './model/shapeArena';
export * from './model/serializeModel';
export * from './source/sourceExtractor';
export * from './source/elementReader';
export * from './parse/events';
export * from './parse/orchestrationParser';
export * from './parse/correlationResolver';
export * from './analyze/shapeCatalog';
export * from './analyze/shapeWalker';
export * from './analyze/patternDetector';
export * from './analyze/receivePattern';
export * from './analyze/fileAnalyzer';
export * from './analyze/recommendations';
export * from './analyze/directoryAnalyzer';
export * from './config/analyzerConfig';
export * from './report/gapReport';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './scan/sourceScanner';
export * from './core/analyzeProject';
export * from './util/deterministicJson';
