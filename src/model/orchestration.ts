/**
 * Orchestration model: the typed control-flow tree built from one `.odx` file.
 *
 * Shapes live in a {@link ShapeArena} and reference each other by integer handle,
 * so parent/child links never form object cycles.
 */

import type { ShapeArena } from './shapeArena';

export type NodeHandle = number;

export type MessageDirection = 'in' | 'out' | 'inout' | '';

export type MessageModel = {
  readonly name: string;
  /** Schema type of the message (e.g. `Schemas.PurchaseOrder`). */
  readonly type: string;
  readonly direction: MessageDirection;
};

export type OperationKind = 'one-way' | 'request-response' | 'unknown';

export type OperationModel = {
  readonly name: string;
  readonly kind: OperationKind;
  /** Message type references are kept by name and resolved lazily. */
  readonly requestMessageType: string;
  readonly responseMessageType: string;
  readonly faultMessageType: string;
};

export type PortTypeModel = {
  readonly name: string;
  readonly modifier: string;
  readonly operations: OperationModel[];
};

export type PortDirection = 'none' | 'receive' | 'send' | 'receive-send' | 'send-receive';

export type BindingKind = 'logical' | 'physical' | 'direct' | 'web' | 'unknown';

export type PortModel = {
  readonly name: string;
  readonly portTypeRef: string;
  readonly direction: PortDirection;
  readonly bindingKind: BindingKind;
  readonly isDynamic: boolean;
  // Filled in later by the binding merge step.
  adapterName: string;
  transportType: string;
  address?: string;
  folderPath?: string;
  fileMask?: string;
  pollingIntervalSeconds?: number;
  receivePipelineName?: string;
  sendPipelineName?: string;
};

export type StatementCorrelationRef = {
  readonly statementOid: string;
  readonly initializes: boolean;
};

export type ShapeHeader = {
  readonly handle: NodeHandle;
  /** Author-assigned identifier; may be empty. */
  readonly oid: string;
  readonly name: string;
  /** Kind tag as counted by the analyzer (e.g. `Decide`, `StartOrchestration`, or the raw kind for fallbacks). */
  readonly shapeType: string;
  /** Position within the parsing context that produced the node. */
  readonly sequence: number;
  readonly parent?: NodeHandle;
  readonly children: NodeHandle[];
  /** Deterministic composite key: `oid|contextPath|sequence`. */
  readonly key: string;
};

export type ReceivePayload = {
  kind: 'receive';
  portName: string;
  messageName: string;
  operationName: string;
  operationMessageName: string;
  activate: boolean;
  initializesCorrelationSets: string[];
  followsCorrelationSets: string[];
};

export type SendPayload = {
  kind: 'send';
  portName: string;
  messageName: string;
  operationName: string;
  operationMessageName: string;
};

export type ConstructPayload = {
  kind: 'construct';
  constructedMessages: string[];
};

export type TransformPayload = {
  kind: 'transform';
  className: string;
  inputMessages: string[];
  outputMessages: string[];
};

/** One payload type per kind, so `Extract<ShapeNode, { kind: K }>` narrows to a single variant. */
type PerKind<K extends string, P> = K extends string ? { kind: K } & P : never;

export type AssignmentPayload = PerKind<'messageAssignment' | 'variableAssignment', { expression: string }>;

export type ConditionLoopPayload = PerKind<'while' | 'until', { expression: string }>;

export type LoopPayload = {
  kind: 'loop';
  loopType: 'Loop' | 'ForEach';
  collectionExpression: string;
  itemVariable: string;
};

export type InvokePayload = PerKind<'call' | 'start', { invokee: string }>;

export type CorrelationDeclarationPayload = {
  kind: 'correlationDeclaration';
  correlationTypeRef: string;
  statementRefs: StatementCorrelationRef[];
};

export type DecidePayload = {
  kind: 'decide';
  condition: string;
  trueBranch: NodeHandle[];
  falseBranch: NodeHandle[];
};

export type SwitchCase = {
  readonly key: string;
  readonly nodes: NodeHandle[];
};

export type SwitchPayload = {
  kind: 'switch';
  discriminant: string;
  cases: SwitchCase[];
  defaultCase: NodeHandle[];
};

export type ListenBranch = {
  readonly name: string;
  readonly oid: string;
  readonly nodes: NodeHandle[];
};

export type ListenPayload = {
  kind: 'listen';
  branches: ListenBranch[];
};

export type TerminatePayload = {
  kind: 'terminate';
  mode: 'Throw' | 'Suspend' | 'Terminate';
  errorMessage: string;
};

export type ExpressionPayload = {
  kind: 'expression';
  expression: string;
};

export type DelayPayload = {
  kind: 'delay';
  delayExpression: string;
};

export type CompensatePayload = {
  kind: 'compensate';
  target: string;
};

export type CatchPayload = {
  kind: 'catch';
  exceptionType: string;
  exceptionVariable: string;
};

export type ContainerKind =
  | 'scope'
  | 'group'
  | 'parallel'
  | 'parallelBranch'
  | 'task'
  | 'compensation'
  | 'atomicTransaction'
  | 'longRunningTransaction';

export type ContainerPayload = PerKind<ContainerKind, Record<never, never>>;

export type VariableDeclarationPayload = {
  kind: 'variableDeclaration';
  varType: string;
  useDefault: string;
};

export type CallRulesPayload = {
  kind: 'callRules';
  policyName: string;
};

export type FallbackPayload = {
  kind: 'fallback';
  details: string;
};

export type ShapePayload =
  | ReceivePayload
  | SendPayload
  | ConstructPayload
  | TransformPayload
  | AssignmentPayload
  | ConditionLoopPayload
  | LoopPayload
  | InvokePayload
  | CorrelationDeclarationPayload
  | DecidePayload
  | SwitchPayload
  | ListenPayload
  | TerminatePayload
  | ExpressionPayload
  | DelayPayload
  | CompensatePayload
  | CatchPayload
  | ContainerPayload
  | VariableDeclarationPayload
  | CallRulesPayload
  | FallbackPayload;

export type ShapeKind = ShapePayload['kind'];

export type ShapeNode = ShapeHeader & ShapePayload;

export type ShapeOfKind<K extends ShapeKind> = Extract<ShapeNode, { kind: K }>;

/** What a per-kind builder produces; the parser adds the remaining header fields. */
export type ShapeDraft = ShapePayload & {
  name: string;
  shapeType: string;
};

export type OrchestrationModel = {
  readonly namespace: string;
  readonly name: string;
  /** `namespace.name`, or just `name` when the namespace is empty. */
  readonly fullName: string;
  readonly messages: MessageModel[];
  readonly portTypes: PortTypeModel[];
  readonly ports: PortModel[];
  /** Service-level declarations (variables, correlation sets) declared outside the body. */
  readonly declarations: NodeHandle[];
  /** Ordered top-level nodes of the service body. */
  readonly nodes: NodeHandle[];
  readonly arena: ShapeArena;
  /** OID → first node that declared it, across the whole tree. */
  readonly index: ReadonlyMap<string, NodeHandle>;
};

export function isShapeOfKind<K extends ShapeKind>(node: ShapeNode, kind: K): node is ShapeOfKind<K> {
  return node.kind === kind;
}

/** Resolve a logical message name to its schema type; unknown names resolve to themselves. */
export function findMessageType(model: Pick<OrchestrationModel, 'messages'>, logicalName: string): string {
  const m = model.messages.find((x) => x.name === logicalName);
  return m ? m.type : logicalName;
}
