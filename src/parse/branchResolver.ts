import type { NodeHandle, ShapeOfKind } from '../model/orchestration';
import { isShapeOfKind } from '../model/orchestration';
import { elementPath, propertyPath } from '../source/elementReader';
import { ParseContext, ParserState, childContext } from './parserState';

/** The part of the shape parser the resolvers call back into. */
export type BodyParser = {
  readonly state: ParserState;
  parseBody(container: Element, ctx: ParseContext, parent?: NodeHandle): NodeHandle[];
};

const EXPRESSION_ELEMENT = elementPath('Expression');

function isBlank(s: string): boolean {
  return s.trim() === '';
}

/** `Expression` of the first nested Expression element, or `''`. */
function nestedExpression(p: BodyParser, el: Element): string {
  return p.state.reader.evaluate(el, `${EXPRESSION_ELEMENT}/${propertyPath('Expression')}`);
}

/** Direct `Expression` property, else the nested Expression element's. */
export function expressionOf(p: BodyParser, el: Element): string {
  const direct = p.state.reader.property(el, 'Expression');
  return isBlank(direct) ? nestedExpression(p, el) : direct;
}

/**
 * Split a decide's `DecisionBranch` containers into true and false branches.
 *
 * The first branch carrying a condition is the true branch; without one, branches are
 * taken by position and the condition comes from an Expression beside the branches.
 * Only one other branch becomes the false branch.
 */
export function resolveDecide(p: BodyParser, node: ShapeOfKind<'decide'>, el: Element, ctx: ParseContext): void {
  const r = p.state.reader;
  const branches = r.childElements(el, 'DecisionBranch');

  if (branches.length === 0) {
    const direct = nestedExpression(p, el);
    if (!isBlank(direct)) node.condition = direct;
    return;
  }

  let ruleIndex = -1;
  for (let i = 0; i < branches.length && ruleIndex < 0; i++) {
    const branch = branches[i];
    if (!branch) continue;
    const expr = expressionOf(p, branch);
    if (!isBlank(expr)) {
      ruleIndex = i;
      node.condition = expr;
    }
  }
  if (ruleIndex < 0) {
    const sibling = nestedExpression(p, el);
    if (!isBlank(sibling)) node.condition = sibling;
  }

  const trueIndex = Math.max(ruleIndex, 0);
  const falseIndex = trueIndex === 0 ? 1 : 0;

  branches.forEach((branch, i) => {
    const branchName = r.property(branch, 'Name');
    if (i !== trueIndex && i !== falseIndex) {
      p.state.emit({ type: 'branch', decide: node.name, role: 'ignored', branchName, shapeCount: 0 });
      return;
    }
    const role = i === trueIndex ? 'true' : 'false';
    const handles = p.parseBody(branch, childContext(ctx, `${node.sequence}:${role}`), node.handle);
    (role === 'true' ? node.trueBranch : node.falseBranch).push(...handles);
    p.state.emit({ type: 'branch', decide: node.name, role, branchName, shapeCount: handles.length });
  });

  if (isBlank(node.condition)) {
    const promoted = p.state.arena
      .resolve(node.trueBranch)
      .find((n): n is ShapeOfKind<'expression'> => isShapeOfKind(n, 'expression'));
    if (promoted) node.condition = promoted.expression;
  }
}

export function isDefaultCase(caseName: string, caseValue: string): boolean {
  const lower = caseName.toLowerCase();
  return isBlank(caseValue) || lower.includes('default') || lower.includes('else');
}

/** Case key: its expression, else its name, else `Case_<n>` (1-based). */
export function caseKey(caseValue: string, caseName: string, index: number): string {
  if (!isBlank(caseValue)) return caseValue;
  return caseName || `Case_${index}`;
}

/** Parse each case container of a switch in its own context; equal keys concatenate. */
export function resolveSwitch(p: BodyParser, node: ShapeOfKind<'switch'>, el: Element, ctx: ParseContext): void {
  const r = p.state.reader;
  node.discriminant = expressionOf(p, el);

  r.childElements(el, 'DecisionBranch').forEach((branch, i) => {
    const index = i + 1;
    const caseName = r.property(branch, 'Name');
    const caseValue = r.property(branch, 'Expression');
    const handles = p.parseBody(branch, childContext(ctx, `${node.sequence}:case${index}`), node.handle);

    if (isDefaultCase(caseName, caseValue)) {
      node.defaultCase.push(...handles);
      p.state.emit({ type: 'case', switchName: node.name, caseKey: '', isDefault: true, shapeCount: handles.length });
      return;
    }

    const key = caseKey(caseValue, caseName, index);
    const existing = node.cases.find((c) => c.key === key);
    if (existing) existing.nodes.push(...handles);
    else node.cases.push({ key, nodes: handles });
    p.state.emit({ type: 'case', switchName: node.name, caseKey: key, isDefault: false, shapeCount: handles.length });
  });
}

const LISTEN_BRANCH_TYPES = ['Task', 'ListenBranch'];

/** Each `Task`/`ListenBranch` container becomes one entry of the listen's branch list. */
export function resolveListen(p: BodyParser, node: ShapeOfKind<'listen'>, el: Element, ctx: ParseContext): void {
  const r = p.state.reader;
  let index = 0;
  for (const child of r.childElements(el)) {
    const type = r.type(child);
    if (!LISTEN_BRANCH_TYPES.includes(type)) {
      p.state.emit({ type: 'skip', elementType: type, reason: 'not a listen branch', contextPath: ctx.path });
      continue;
    }
    index++;
    const nodes = p.parseBody(child, childContext(ctx, `${node.sequence}:branch${index}`), node.handle);
    node.branches.push({ name: r.property(child, 'Name') || `Branch_${index}`, oid: r.oid(child), nodes });
  }
}
