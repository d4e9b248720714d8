import type { FlaggedFiles, GapReport } from './gapReport';
import { formatRecommendation } from './gapReport';
import { ownValue } from './reportBuilder';

function esc(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countTable(lines: string[], header: string, counts: Record<string, number>): void {
  lines.push(`| ${header} | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => (counts[b] ?? 0) - (counts[a] ?? 0) || a.localeCompare(b));
  for (const k of keys) lines.push(`| ${esc(k)} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

const FLAG_LABELS: ReadonlyArray<[keyof FlaggedFiles, string]> = [
  ['correlation', 'Correlation sets'],
  ['dynamicPorts', 'Dynamic ports'],
  ['transactions', 'Transactions'],
  ['businessRules', 'Business rules'],
  ['compensation', 'Compensation'],
  ['convoy', 'Convoy'],
  ['aggregator', 'Aggregator pattern'],
  ['contentBasedRouting', 'Content-based routing'],
  ['scatterGather', 'Scatter-gather pattern'],
  ['messageBroker', 'Message broker pattern'],
];

export function reportToMarkdown(report: GapReport): string {
  const lines: string[] = [];

  lines.push(`# Migration gap report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Source root: \`${report.sourceRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files analyzed: **${report.filesAnalyzed}**`);
  lines.push(`- Files parsed: **${report.filesParsed}**`);
  lines.push(`- Files failed: **${report.filesFailed}**`);
  lines.push('');

  lines.push(`## Shape types`);
  lines.push('');
  countTable(lines, 'Shape type', report.shapeTypeFrequency);

  lines.push(`## Unsupported shapes`);
  lines.push('');
  lines.push(`| Shape type | Files | Examples |`);
  lines.push(`|---|---:|---|`);
  const unsupported = Object.entries(report.unsupportedShapeFrequency).sort(
    (a, b) => b[1] - a[1] || a[0].localeCompare(b[0]),
  );
  for (const [shape, n] of unsupported) {
    const examples = (ownValue(report.unsupportedShapeExamples, shape) ?? []).map(esc).join(', ');
    lines.push(`| ${esc(shape)} | ${n} | ${examples} |`);
  }
  if (unsupported.length === 0) lines.push(`| (none) | 0 |  |`);
  lines.push('');

  lines.push(`## Features and patterns`);
  lines.push('');
  lines.push(`| Feature | Files |`);
  lines.push(`|---|---:|`);
  for (const [key, label] of FLAG_LABELS) lines.push(`| ${label} | ${report.filesWith[key].length} |`);
  lines.push('');

  lines.push(`## Complexity`);
  lines.push('');
  lines.push(`- Simple (< 5 shape types): **${report.complexity.simple.length}**`);
  lines.push(`- Medium (5 to 9 shape types): **${report.complexity.medium.length}**`);
  lines.push(`- Complex (10+ shape types): **${report.complexity.complex.length}**`);
  lines.push('');

  if (report.mostComplex.length > 0) {
    lines.push(`### Most complex files`);
    lines.push('');
    lines.push(`| File | Shape types | Size (KB) | Unsupported |`);
    lines.push(`|---|---:|---:|---|`);
    for (const f of report.mostComplex) {
      lines.push(`| ${esc(f.fileName)} | ${f.shapeTypeCount} | ${f.sizeKb} | ${f.unsupportedShapes.map(esc).join(', ')} |`);
    }
    lines.push('');
  }

  const failed = report.files.filter((f) => !f.parsed);
  if (failed.length > 0) {
    lines.push(`## Failed files`);
    lines.push('');
    lines.push(`| File | Code | Error |`);
    lines.push(`|---|---|---|`);
    for (const f of failed) {
      lines.push(`| ${esc(f.fileName)} | ${f.errorCode ?? ''} | ${esc(f.parseError ?? '')} |`);
    }
    lines.push('');
  }

  lines.push(`## Recommendations`);
  lines.push('');
  for (const r of report.recommendations) lines.push(`- ${esc(formatRecommendation(r))}`);
  if (report.recommendations.length === 0) lines.push(`- (none)`);
  lines.push('');
  return lines.join('\n');
}
