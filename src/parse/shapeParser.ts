import type { NodeHandle, ShapeNode, ShapeOfKind } from '../model/orchestration';
import { BodyParser, resolveDecide, resolveListen, resolveSwitch } from './branchResolver';
import { ParseContext, ParserState } from './parserState';
import { METADATA_ELEMENT_TYPES, lookupRule } from './shapeBuilders';

/**
 * Recursive-descent builder from designer elements to shape nodes.
 *
 * Sequence numbers come from the context passed in, so generic children share their
 * enclosing context's counter while branch, case and listen bodies get their own.
 */
export class ShapeTreeParser implements BodyParser {
  constructor(readonly state: ParserState) {}

  /** Parse the `Element` children of `container`; returns the handles created at this level. */
  parseBody(
    container: Element,
    ctx: ParseContext,
    parent?: NodeHandle,
    skipTypes: readonly string[] = [],
    skipFirstOf: readonly string[] = [],
  ): NodeHandle[] {
    const r = this.state.reader;
    const out: NodeHandle[] = [];
    const pendingFirst = new Set(skipFirstOf);
    for (const el of r.childElements(container)) {
      const type = r.type(el) || 'Unknown';
      if (skipTypes.includes(type) || pendingFirst.delete(type)) continue;
      if (METADATA_ELEMENT_TYPES.has(type)) {
        this.state.emit({ type: 'skip', elementType: type, reason: 'metadata element', contextPath: ctx.path });
        continue;
      }
      out.push(this.parseElement(el, type, ctx, parent).handle);
    }
    return out;
  }

  parseElement(el: Element, type: string, ctx: ParseContext, parent?: NodeHandle): ShapeNode {
    const r = this.state.reader;
    const { rule, known } = lookupRule(type);
    const node = this.state.createNode(rule.build(el, r, type), r.oid(el), ctx, parent);
    if (!known) this.state.emit({ type: 'unknownShape', elementType: type, oid: node.oid, contextPath: ctx.path });

    switch (node.kind) {
      case 'decide':
        resolveDecide(this, node, el, ctx);
        break;
      case 'switch':
        resolveSwitch(this, node, el, ctx);
        break;
      case 'listen':
        resolveListen(this, node, el, ctx);
        break;
      case 'construct':
        this.parseConstructParts(node, el, ctx);
        break;
      default:
        break;
    }

    if (rule.recurse) node.children.push(...this.parseBody(el, ctx, node.handle, rule.consumes, rule.consumesFirst));
    return node;
  }

  // Inner transforms and assignments, in document order, on the construct's counter.
  private parseConstructParts(node: ShapeOfKind<'construct'>, el: Element, ctx: ParseContext): void {
    const r = this.state.reader;
    for (const inner of r.childElements(el, 'Transform', 'MessageAssignment')) {
      node.children.push(this.parseElement(inner, r.type(inner), ctx, node.handle).handle);
    }
  }
}
