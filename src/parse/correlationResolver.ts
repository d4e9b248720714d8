import { isShapeOfKind } from '../model/orchestration';
import type { NodeHandle } from '../model/orchestration';
import { ShapeArena } from '../model/shapeArena';
import type { ParseEventSink } from './events';

/**
 * Attach correlation-set usage to the receives a declaration's statement references
 * point at. Runs after the whole tree is built; only appends, and never the same name
 * twice, so it can safely run again.
 */
export function resolveCorrelations(
  arena: ShapeArena,
  index: ReadonlyMap<string, NodeHandle>,
  onEvent?: ParseEventSink,
): void {
  for (const decl of arena.all()) {
    if (!isShapeOfKind(decl, 'correlationDeclaration')) continue;
    for (const ref of decl.statementRefs) {
      if (ref.statementOid === '') continue;
      const handle = index.get(ref.statementOid);
      const target = handle === undefined ? undefined : arena.get(handle);
      if (!target) {
        onEvent?.({ type: 'correlation', declaration: decl.name, statementOid: ref.statementOid, outcome: 'unresolved' });
        continue;
      }
      if (!isShapeOfKind(target, 'receive')) {
        onEvent?.({ type: 'correlation', declaration: decl.name, statementOid: ref.statementOid, outcome: 'notReceive' });
        continue;
      }
      const list = ref.initializes ? target.initializesCorrelationSets : target.followsCorrelationSets;
      if (!list.includes(decl.name)) list.push(decl.name);
      onEvent?.({
        type: 'correlation',
        declaration: decl.name,
        statementOid: ref.statementOid,
        outcome: ref.initializes ? 'initializes' : 'follows',
      });
    }
  }
}
