import type { NodeHandle, OrchestrationModel, ShapeNode } from '../model/orchestration';

/**
 * Handles reachable from a node: generic children first, then the decide, switch
 * and listen payload lists (those are never mirrored into `children`).
 */
export function reachableHandles(node: ShapeNode): NodeHandle[] {
  const out = [...node.children];
  switch (node.kind) {
    case 'decide':
      out.push(...node.trueBranch, ...node.falseBranch);
      break;
    case 'switch':
      for (const c of node.cases) out.push(...c.nodes);
      out.push(...node.defaultCase);
      break;
    case 'listen':
      for (const b of node.branches) out.push(...b.nodes);
      break;
    default:
      break;
  }
  return out;
}

/** Depth-first, pre-order visit of service declarations then the body. */
export function walkShapes(model: OrchestrationModel, visit: (node: ShapeNode) => void): void {
  const stack: NodeHandle[] = [...model.declarations, ...model.nodes].reverse();
  while (stack.length > 0) {
    const handle = stack.pop();
    if (handle === undefined) break;
    const node = model.arena.get(handle);
    visit(node);
    stack.push(...reachableHandles(node).reverse());
  }
}

export function collectShapes(model: OrchestrationModel): ShapeNode[] {
  const out: ShapeNode[] = [];
  walkShapes(model, (n) => out.push(n));
  return out;
}
