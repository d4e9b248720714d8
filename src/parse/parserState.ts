import { ShapeArena } from '../model/shapeArena';
import type { NodeHandle, ShapeDraft, ShapeNode } from '../model/orchestration';
import { ElementReader } from '../source/elementReader';
import type { ParseEvent, ParseEventSink } from './events';

/**
 * One sequence-numbering scope: the service body, a decide branch, a switch case,
 * a listen branch, or the service-level declarations.
 */
export type ParseContext = {
  readonly path: string;
  nextSequence: number;
};

export function createContext(path: string): ParseContext {
  return { path, nextSequence: 0 };
}

/** Nested context below `parent`, e.g. `body/3:true`. */
export function childContext(parent: ParseContext, segment: string): ParseContext {
  return createContext(`${parent.path}/${segment}`);
}

/**
 * State shared by every recursive call while one file is parsed: the node arena,
 * the global OID index, the element reader and the optional event sink.
 */
export class ParserState {
  readonly arena = new ShapeArena();
  private readonly oidIndex = new Map<string, NodeHandle>();

  constructor(
    readonly reader: ElementReader,
    private readonly sink?: ParseEventSink,
  ) {}

  get index(): ReadonlyMap<string, NodeHandle> {
    return this.oidIndex;
  }

  emit(event: ParseEvent): void {
    this.sink?.(event);
  }

  /** Allocate a node with the next sequence of `ctx` and index it by OID (first wins). */
  createNode(draft: ShapeDraft, oid: string, ctx: ParseContext, parent?: NodeHandle): ShapeNode {
    const sequence = ctx.nextSequence++;
    const node = this.arena.add(draft, { oid, sequence, parent, contextPath: ctx.path });
    if (oid !== '' && !this.oidIndex.has(oid)) this.oidIndex.set(oid, node.handle);
    this.emit({ type: 'shape', shapeType: node.shapeType, oid, name: node.name, contextPath: ctx.path, sequence });
    return node;
  }
}
