import { isShapeOfKind } from './orchestration';
import type { NodeHandle, ShapeDraft, ShapeKind, ShapeNode, ShapeOfKind } from './orchestration';

export type ShapePlacement = {
  oid: string;
  sequence: number;
  parent?: NodeHandle;
  contextPath: string;
};

/**
 * Flat store of shape nodes addressed by stable integer handles (allocation order).
 */
export class ShapeArena {
  private readonly nodes: ShapeNode[] = [];

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Allocate a node. When `parent` is given the node is NOT added to the parent's
   * children here; callers decide between the generic child list and a payload slot.
   */
  add(draft: ShapeDraft, placement: ShapePlacement): ShapeNode {
    const handle = this.nodes.length;
    const node: ShapeNode = {
      ...draft,
      handle,
      oid: placement.oid,
      sequence: placement.sequence,
      parent: placement.parent,
      children: [],
      key: compositeKey(placement.oid, placement.contextPath, placement.sequence),
    };
    this.nodes.push(node);
    return node;
  }

  get(handle: NodeHandle): ShapeNode {
    const node = this.nodes[handle];
    if (!node) throw new RangeError(`Unknown shape handle: ${handle}`);
    return node;
  }

  getAs<K extends ShapeKind>(handle: NodeHandle, kind: K): ShapeOfKind<K> | undefined {
    const node = this.get(handle);
    return isShapeOfKind(node, kind) ? node : undefined;
  }

  resolve(handles: readonly NodeHandle[]): ShapeNode[] {
    return handles.map((h) => this.get(h));
  }

  parentOf(node: ShapeNode): ShapeNode | undefined {
    return node.parent === undefined ? undefined : this.get(node.parent);
  }

  /** Nearest ancestor of the given kind, or undefined. */
  findAncestor<K extends ShapeKind>(node: ShapeNode, kind: K): ShapeOfKind<K> | undefined {
    let current = this.parentOf(node);
    while (current) {
      if (isShapeOfKind(current, kind)) return current;
      current = this.parentOf(current);
    }
    return undefined;
  }

  all(): readonly ShapeNode[] {
    return this.nodes;
  }
}

/** Deterministic per-node identifier: OID plus parsing-context path plus local sequence. */
export function compositeKey(oid: string, contextPath: string, sequence: number): string {
  return `${oid}|${contextPath}|${sequence}`;
}
