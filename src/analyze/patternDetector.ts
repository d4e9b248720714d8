import type { OrchestrationModel, ShapeNode } from '../model/orchestration';

export type FeatureFlags = {
  hasCorrelationSets: boolean;
  hasDynamicPorts: boolean;
  hasTransactions: boolean;
  hasExceptionHandling: boolean;
  hasBusinessRules: boolean;
  hasCompensation: boolean;
  hasLoops: boolean;
  hasParallel: boolean;
  hasListen: boolean;
  hasDelay: boolean;
  hasCallOrchestration: boolean;
  hasTransform: boolean;
  /** Some port is receive-then-send or send-then-receive. */
  hasSolicitResponse: boolean;
  hasConvoy: boolean;
};

export type PatternFlags = {
  aggregator: boolean;
  contentBasedRouting: boolean;
  scatterGather: boolean;
  messageBroker: boolean;
};

type KindFlag = Exclude<keyof FeatureFlags, 'hasSolicitResponse' | 'hasConvoy'>;

/** Lower-cased shape kinds that switch a feature on. */
const KIND_FLAGS: Readonly<Record<string, KindFlag>> = {
  correlationdeclaration: 'hasCorrelationSets',
  initializecorrelation: 'hasCorrelationSets',
  followscorrelation: 'hasCorrelationSets',
  dynamicport: 'hasDynamicPorts',
  atomictransaction: 'hasTransactions',
  longrunningtransaction: 'hasTransactions',
  catch: 'hasExceptionHandling',
  catchexception: 'hasExceptionHandling',
  callrules: 'hasBusinessRules',
  callpolicy: 'hasBusinessRules',
  compensation: 'hasCompensation',
  compensate: 'hasCompensation',
  loop: 'hasLoops',
  foreach: 'hasLoops',
  while: 'hasLoops',
  until: 'hasLoops',
  parallel: 'hasParallel',
  listen: 'hasListen',
  delay: 'hasDelay',
  call: 'hasCallOrchestration',
  start: 'hasCallOrchestration',
  startorchestration: 'hasCallOrchestration',
  transform: 'hasTransform',
};

export function emptyFeatureFlags(): FeatureFlags {
  return {
    hasCorrelationSets: false,
    hasDynamicPorts: false,
    hasTransactions: false,
    hasExceptionHandling: false,
    hasBusinessRules: false,
    hasCompensation: false,
    hasLoops: false,
    hasParallel: false,
    hasListen: false,
    hasDelay: false,
    hasCallOrchestration: false,
    hasTransform: false,
    hasSolicitResponse: false,
    hasConvoy: false,
  };
}

export function emptyPatternFlags(): PatternFlags {
  return { aggregator: false, contentBasedRouting: false, scatterGather: false, messageBroker: false };
}

/** Set the flag a single shape kind implies, if any. */
export function applyKindFlag(flags: FeatureFlags, shapeType: string): void {
  const key = shapeType.toLowerCase();
  if (Object.hasOwn(KIND_FLAGS, key)) {
    const flag = KIND_FLAGS[key];
    if (flag) flags[flag] = true;
  }
}

export function countWhere(shapes: readonly ShapeNode[], ...shapeTypes: string[]): number {
  const wanted = new Set(shapeTypes.map((t) => t.toLowerCase()));
  return shapes.filter((s) => wanted.has(s.shapeType.toLowerCase())).length;
}

/**
 * Feature flags over every reachable shape plus the port list. Convoy means more than
 * one activating receive or more than one correlation set.
 */
export function detectFeatures(model: OrchestrationModel, shapes: readonly ShapeNode[]): FeatureFlags {
  const flags = emptyFeatureFlags();
  for (const s of shapes) applyKindFlag(flags, s.shapeType);

  if (model.ports.some((p) => p.isDynamic)) flags.hasDynamicPorts = true;
  flags.hasSolicitResponse = model.ports.some((p) => p.direction === 'send-receive' || p.direction === 'receive-send');

  const correlationSets = shapes.filter((s) => s.kind === 'correlationDeclaration').length;
  const activating = shapes.filter((s) => s.kind === 'receive' && s.activate).length;
  flags.hasConvoy = activating > 1 || correlationSets > 1;
  return flags;
}

export type PatternCounts = {
  receive: number;
  send: number;
  decide: number;
  parallel: number;
  construct: number;
  transform: number;
};

export function patternCounts(shapes: readonly ShapeNode[]): PatternCounts {
  return {
    receive: countWhere(shapes, 'Receive'),
    send: countWhere(shapes, 'Send'),
    decide: countWhere(shapes, 'Decide', 'If'),
    parallel: countWhere(shapes, 'Parallel'),
    construct: countWhere(shapes, 'Construct'),
    transform: countWhere(shapes, 'Transform'),
  };
}

/** Integration-pattern signatures from tree-wide kind counts. */
export function detectPatterns(c: PatternCounts, hasCorrelationSets: boolean): PatternFlags {
  return {
    aggregator: c.receive >= 2 && hasCorrelationSets && (c.construct > 0 || c.transform > 0),
    contentBasedRouting: c.decide > 0 && c.send >= 2,
    scatterGather: c.parallel > 0 && c.send >= 2 && c.receive >= 2,
    messageBroker: c.receive >= 2 && c.decide > 0 && c.send >= 2,
  };
}
