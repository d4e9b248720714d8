import type { ShapeDraft, StatementCorrelationRef } from '../model/orchestration';
import { ElementReader } from '../source/elementReader';

export type ShapeBuilder = (el: Element, reader: ElementReader, type: string) => ShapeDraft;

export type ShapeRule = {
  build: ShapeBuilder;
  /** Whether raw child elements are parsed as generic children. */
  recurse: boolean;
  /** Child element types read into the payload; never parsed as shapes. */
  consumes?: readonly string[];
  /** Only the first child of each of these types is payload; later ones are shapes. */
  consumesFirst?: readonly string[];
};

/** Element types that carry metadata only and never become nodes. */
export const METADATA_ELEMENT_TYPES: ReadonlySet<string> = new Set(['TransactionAttribute']);

const DEFAULT_ITEM_VARIABLE = 'item';
const MAX_POLICY_SEGMENT = 40;

function nameOf(el: Element, r: ElementReader, fallback = ''): string {
  return r.property(el, 'Name') || fallback;
}

/** Letters and digits of a policy identifier, capped in length. */
export function safePolicySegment(policy: string): string {
  return policy.replace(/[^\p{L}\p{N}]/gu, '').slice(0, MAX_POLICY_SEGMENT);
}

export function callRulesName(policy: string): string {
  return policy.trim() === '' ? 'Execute_Rules_Engine' : `Execute_Rules_Engine_${safePolicySegment(policy)}`;
}

export function isCallRulesType(type: string): boolean {
  const t = type.toLowerCase();
  return t === 'callrules' || t === 'callpolicy';
}

const buildCallRules: ShapeBuilder = (el, r) => {
  const policyName = r.firstProperty(el, 'Policy', 'PolicyName', 'Ruleset');
  return { kind: 'callRules', shapeType: 'CallRules', name: nameOf(el, r, callRulesName(policyName)), policyName };
};

/**
 * Transform message references. With exactly two part references the second is
 * the output and the first the input; any other count stays as inputs only.
 */
export function transformMessages(el: Element, r: ElementReader): { inputMessages: string[]; outputMessages: string[] } {
  const refs = r
    .childElements(el, 'MessagePartRef')
    .map((p) => r.property(p, 'MessageRef'))
    .filter((m) => m !== '');
  if (refs.length === 2) return { inputMessages: [refs[0] ?? ''], outputMessages: [refs[1] ?? ''] };
  return { inputMessages: refs, outputMessages: [] };
}

function statementRefs(el: Element, r: ElementReader): StatementCorrelationRef[] {
  return r.childElements(el, 'StatementRef').map((s) => ({
    statementOid: r.property(s, 'Ref'),
    initializes: r.property(s, 'Initializes') === 'True',
  }));
}

const RULES: Readonly<Record<string, ShapeRule>> = {
  Receive: {
    recurse: true,
    build: (el, r) => ({
      kind: 'receive',
      shapeType: 'Receive',
      name: nameOf(el, r),
      portName: r.property(el, 'PortName'),
      messageName: r.property(el, 'MessageName'),
      operationName: r.property(el, 'OperationName'),
      operationMessageName: r.property(el, 'OperationMessageName'),
      activate: r.property(el, 'Activate') === 'True',
      initializesCorrelationSets: [],
      followsCorrelationSets: [],
    }),
  },
  Send: {
    recurse: true,
    build: (el, r) => ({
      kind: 'send',
      shapeType: 'Send',
      name: nameOf(el, r),
      portName: r.property(el, 'PortName'),
      messageName: r.property(el, 'MessageName'),
      operationName: r.property(el, 'OperationName'),
      operationMessageName: r.property(el, 'OperationMessageName'),
    }),
  },
  Construct: {
    recurse: false,
    build: (el, r) => ({
      kind: 'construct',
      shapeType: 'Construct',
      name: nameOf(el, r),
      constructedMessages: r
        .childElements(el, 'MessageRef')
        .map((m) => r.property(m, 'Ref'))
        .filter((m) => m !== ''),
    }),
  },
  Transform: {
    recurse: true,
    consumes: ['MessagePartRef', 'MessageRef'],
    build: (el, r) => ({
      kind: 'transform',
      shapeType: 'Transform',
      name: nameOf(el, r),
      className: r.property(el, 'ClassName'),
      ...transformMessages(el, r),
    }),
  },
  MessageAssignment: {
    recurse: false,
    build: (el, r) => ({
      kind: 'messageAssignment',
      shapeType: 'MessageAssignment',
      name: nameOf(el, r),
      expression: r.property(el, 'Expression'),
    }),
  },
  VariableAssignment: {
    recurse: true,
    build: (el, r) => ({
      kind: 'variableAssignment',
      shapeType: 'VariableAssignment',
      name: nameOf(el, r),
      expression: r.property(el, 'Expression'),
    }),
  },
  While: {
    recurse: true,
    build: (el, r) => ({ kind: 'while', shapeType: 'While', name: nameOf(el, r), expression: r.property(el, 'Expression') }),
  },
  Until: {
    recurse: true,
    build: (el, r) => ({ kind: 'until', shapeType: 'Until', name: nameOf(el, r), expression: r.property(el, 'Expression') }),
  },
  Loop: {
    recurse: true,
    consumes: ['IteratorVariable'],
    consumesFirst: ['Expression'],
    build: (el, r) => buildLoop(el, r, 'Loop'),
  },
  ForEach: {
    recurse: true,
    consumes: ['IteratorVariable'],
    consumesFirst: ['Expression'],
    build: (el, r) => buildLoop(el, r, 'ForEach'),
  },
  Call: {
    recurse: true,
    build: (el, r) => ({ kind: 'call', shapeType: 'Call', name: nameOf(el, r), invokee: r.property(el, 'Invokee') }),
  },
  StartOrchestration: {
    recurse: true,
    build: (el, r) => ({
      kind: 'start',
      shapeType: 'StartOrchestration',
      name: nameOf(el, r),
      invokee: r.property(el, 'Invokee'),
    }),
  },
  CorrelationDeclaration: {
    recurse: true,
    consumes: ['StatementRef'],
    build: (el, r) => ({
      kind: 'correlationDeclaration',
      shapeType: 'CorrelationDeclaration',
      name: nameOf(el, r),
      correlationTypeRef: r.property(el, 'Type'),
      statementRefs: statementRefs(el, r),
    }),
  },
  Decide: {
    recurse: false,
    build: (el, r) => ({ kind: 'decide', shapeType: 'Decide', name: nameOf(el, r), condition: '', trueBranch: [], falseBranch: [] }),
  },
  Switch: {
    recurse: false,
    build: (el, r) => ({ kind: 'switch', shapeType: 'Switch', name: nameOf(el, r), discriminant: '', cases: [], defaultCase: [] }),
  },
  Listen: {
    recurse: false,
    build: (el, r) => ({ kind: 'listen', shapeType: 'Listen', name: nameOf(el, r, 'Listen'), branches: [] }),
  },
  Throw: {
    recurse: true,
    build: (el, r) => ({
      kind: 'terminate',
      shapeType: 'Throw',
      mode: 'Throw',
      name: nameOf(el, r),
      errorMessage: r.firstProperty(el, 'Exception', 'ExceptionType'),
    }),
  },
  Suspend: {
    recurse: true,
    build: (el, r) => ({
      kind: 'terminate',
      shapeType: 'Suspend',
      mode: 'Suspend',
      name: nameOf(el, r),
      errorMessage: r.property(el, 'ErrorMessage') || 'Suspended',
    }),
  },
  Terminate: {
    recurse: true,
    build: (el, r) => ({
      kind: 'terminate',
      shapeType: 'Terminate',
      mode: 'Terminate',
      name: nameOf(el, r),
      errorMessage: r.property(el, 'ErrorMessage'),
    }),
  },
  Expression: {
    recurse: true,
    build: (el, r) => ({ kind: 'expression', shapeType: 'Expression', name: nameOf(el, r), expression: r.property(el, 'Expression') }),
  },
  Delay: {
    recurse: true,
    build: (el, r) => ({ kind: 'delay', shapeType: 'Delay', name: nameOf(el, r), delayExpression: r.property(el, 'Expression') }),
  },
  Compensate: {
    recurse: true,
    build: (el, r) => ({ kind: 'compensate', shapeType: 'Compensate', name: nameOf(el, r), target: r.property(el, 'Target') }),
  },
  Catch: {
    recurse: true,
    build: (el, r, type) => ({
      kind: 'catch',
      shapeType: type,
      name: nameOf(el, r),
      exceptionType: r.firstProperty(el, 'ExceptionType', 'Exception') || 'System.Exception',
      exceptionVariable: r.firstProperty(el, 'ExceptionName', 'ExceptionVariable') || 'ex',
    }),
  },
  Scope: { recurse: true, build: (el, r) => ({ kind: 'scope', shapeType: 'Scope', name: nameOf(el, r) }) },
  Group: { recurse: true, build: (el, r) => ({ kind: 'group', shapeType: 'Group', name: nameOf(el, r) }) },
  Parallel: { recurse: true, build: (el, r) => ({ kind: 'parallel', shapeType: 'Parallel', name: nameOf(el, r) }) },
  ParallelBranch: {
    recurse: true,
    build: (el, r) => ({ kind: 'parallelBranch', shapeType: 'ParallelBranch', name: nameOf(el, r, 'ParallelBranch') }),
  },
  Task: { recurse: true, build: (el, r) => ({ kind: 'task', shapeType: 'Task', name: nameOf(el, r, 'Task') }) },
  Compensation: {
    recurse: true,
    build: (el, r) => ({ kind: 'compensation', shapeType: 'Compensation', name: nameOf(el, r) }),
  },
  AtomicTransaction: {
    recurse: true,
    build: (el, r) => ({ kind: 'atomicTransaction', shapeType: 'AtomicTransaction', name: nameOf(el, r) }),
  },
  LongRunningTransaction: {
    recurse: true,
    build: (el, r) => ({ kind: 'longRunningTransaction', shapeType: 'LongRunningTransaction', name: nameOf(el, r) }),
  },
  VariableDeclaration: {
    recurse: true,
    build: (el, r) => ({
      kind: 'variableDeclaration',
      shapeType: 'VariableDeclaration',
      name: nameOf(el, r),
      varType: r.property(el, 'Type'),
      useDefault: r.property(el, 'UseDefaultConstructor'),
    }),
  },
  // Messages declared inside a scope are treated as variables.
  MessageDeclaration: {
    recurse: true,
    build: (el, r) => ({
      kind: 'variableDeclaration',
      shapeType: 'VariableDeclaration',
      name: nameOf(el, r),
      varType: r.property(el, 'Type'),
      useDefault: '',
    }),
  },
};

/** Legacy kind names, matched case-insensitively. */
const LEGACY_ALIASES: Readonly<Record<string, string>> = {
  decision: 'Decide',
  if: 'Decide',
  ifelse: 'Decide',
  exec: 'StartOrchestration',
  start: 'StartOrchestration',
  startorchestration: 'StartOrchestration',
  catchexception: 'Catch',
};

const CALL_RULES_RULE: ShapeRule = { recurse: true, build: buildCallRules };

const FALLBACK_RULE: ShapeRule = {
  recurse: true,
  build: (el, r, type) => ({
    kind: 'fallback',
    shapeType: type,
    name: nameOf(el, r, `Unknown_${type}`),
    details: `Unhandled shape type: ${type}`,
  }),
};

function buildLoop(el: Element, r: ElementReader, loopType: 'Loop' | 'ForEach'): ShapeDraft {
  const exprEl = r.selectFirst(el, "om:Element[@Type='Expression']");
  return {
    kind: 'loop',
    shapeType: loopType,
    loopType,
    name: nameOf(el, r),
    collectionExpression: exprEl ? r.property(exprEl, 'Expression') : '',
    itemVariable: r.evaluate(el, "om:Element[@Type='IteratorVariable']/om:Property[@Name='Name']/@Value") || DEFAULT_ITEM_VARIABLE,
  };
}

function ownEntry<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export type RuleLookup = {
  rule: ShapeRule;
  /** False when the kind is not recognised and a fallback node is built. */
  known: boolean;
};

/** Business-rules calls first, then the exact table, then legacy aliases, then the fallback. */
export function lookupRule(type: string): RuleLookup {
  if (isCallRulesType(type)) return { rule: CALL_RULES_RULE, known: true };
  const exact = ownEntry(RULES, type);
  if (exact) return { rule: exact, known: true };
  const alias = ownEntry(LEGACY_ALIASES, type.toLowerCase());
  const aliased = alias === undefined ? undefined : ownEntry(RULES, alias);
  if (aliased) return { rule: aliased, known: true };
  return { rule: FALLBACK_RULE, known: false };
}
