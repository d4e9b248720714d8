/**
 * Diagnostic events emitted while building the shape tree and scanning a directory.
 * Nothing here prints; callers that want a trace pass a sink (the CLI does under --verbose).
 */

export type ParseEvent =
  | { type: 'shape'; shapeType: string; oid: string; name: string; contextPath: string; sequence: number }
  | { type: 'skip'; elementType: string; reason: string; contextPath: string }
  | { type: 'unknownShape'; elementType: string; oid: string; contextPath: string }
  | { type: 'branch'; decide: string; role: 'true' | 'false' | 'ignored'; branchName: string; shapeCount: number }
  | { type: 'case'; switchName: string; caseKey: string; isDefault: boolean; shapeCount: number }
  | { type: 'correlation'; declaration: string; statementOid: string; outcome: 'initializes' | 'follows' | 'unresolved' | 'notReceive' }
  | { type: 'xmlWarning'; message: string }
  | { type: 'file'; fileName: string; parsed: boolean; shapeTypeCount: number; error?: string };

export type ParseEventSink = (event: ParseEvent) => void;

export function formatParseEvent(e: ParseEvent): string {
  switch (e.type) {
    case 'shape':
      return `[parse] ${e.shapeType} '${e.name}' (oid ${e.oid || '-'}) at ${e.contextPath}#${e.sequence}`;
    case 'skip':
      return `[parse] skipped ${e.elementType} at ${e.contextPath}: ${e.reason}`;
    case 'unknownShape':
      return `[parse] unknown shape type ${e.elementType} (oid ${e.oid || '-'}) at ${e.contextPath}`;
    case 'branch':
      return `[parse] decide '${e.decide}': branch '${e.branchName}' -> ${e.role} (${e.shapeCount} shape(s))`;
    case 'case':
      return `[parse] switch '${e.switchName}': ${e.isDefault ? 'default case' : `case '${e.caseKey}'`} (${e.shapeCount} shape(s))`;
    case 'correlation':
      return `[parse] correlation '${e.declaration}' -> ${e.statementOid}: ${e.outcome}`;
    case 'xmlWarning':
      return `[xml] ${e.message}`;
    case 'file':
      return e.parsed
        ? `[analyze] ${e.fileName}: ok (${e.shapeTypeCount} shape types)`
        : `[analyze] ${e.fileName}: failed: ${e.error ?? 'unknown error'}`;
  }
}
