import type { NodeHandle, OrchestrationModel, ShapeNode, ShapeOfKind } from '../model/orchestration';
import { isShapeOfKind } from '../model/orchestration';
import { collectShapes } from './shapeWalker';

export type ReceivePattern =
  | 'Callable'
  | 'SingleTrigger'
  | 'Convoy'
  | 'ListenFirstToComplete'
  | 'ParallelAllMustComplete'
  | 'Invalid';

export type ReceivePatternAnalysis = {
  pattern: ReceivePattern;
  primaryReceive?: NodeHandle;
  secondaryReceives: NodeHandle[];
  requiresSessionSupport: boolean;
  requiresRequestTrigger: boolean;
  requiresTimeoutHandling: boolean;
  /** Set for patterns that cannot be migrated as one workflow. */
  migrationError?: string;
  warnings: string[];
};

export function isValidReceivePattern(a: Pick<ReceivePatternAnalysis, 'pattern'>): boolean {
  return a.pattern !== 'Invalid' && a.pattern !== 'ParallelAllMustComplete';
}

function base(pattern: ReceivePattern): ReceivePatternAnalysis {
  return {
    pattern,
    secondaryReceives: [],
    requiresSessionSupport: false,
    requiresRequestTrigger: false,
    requiresTimeoutHandling: false,
    warnings: [],
  };
}

const isReceive = (n: ShapeNode): n is ShapeOfKind<'receive'> => isShapeOfKind(n, 'receive');

/**
 * Classify how instances of the orchestration are started, from its activating receives
 * and where they sit in the tree.
 */
export function analyzeReceivePattern(model: OrchestrationModel): ReceivePatternAnalysis {
  const receives = collectShapes(model).filter(isReceive);
  const activating = receives.filter((r) => r.activate);
  const [first, ...rest] = activating;

  if (!first) {
    return {
      ...base('Callable'),
      requiresRequestTrigger: true,
      warnings: ['No activating Receive shapes found; the workflow starts on an explicit request (callable workflow).'],
    };
  }

  if (rest.length === 0) {
    const following = receives.filter((r) => !r.activate && r.followsCorrelationSets.length > 0);
    if (first.initializesCorrelationSets.length > 0 && following.length > 0) {
      return {
        ...base('Convoy'),
        primaryReceive: first.handle,
        secondaryReceives: following.map((r) => r.handle),
        requiresSessionSupport: true,
        warnings: [
          `Convoy pattern detected with ${following.length} correlated receive(s); ` +
            'requires a session-capable message broker or a custom correlation store.',
        ],
      };
    }
    return { ...base('SingleTrigger'), primaryReceive: first.handle };
  }

  const primary = { primaryReceive: first.handle, secondaryReceives: rest.map((r) => r.handle) };

  const listens = activating.map((r) => model.arena.findAncestor(r, 'listen'));
  const listenHandles = new Set(listens.map((l) => l?.handle));
  if (listens.every((l) => l !== undefined) && listenHandles.size === 1) {
    return {
      ...base('ListenFirstToComplete'),
      ...primary,
      requiresTimeoutHandling: true,
      warnings: [
        `Listen shape with ${activating.length} activating receives detected; the first receive becomes the trigger ` +
          'and the others are handled as branches. First-to-complete cancellation is not native to the target.',
      ],
    };
  }

  if (activating.every((r) => model.arena.findAncestor(r, 'parallel') !== undefined)) {
    return {
      ...base('ParallelAllMustComplete'),
      ...primary,
      migrationError:
        `Invalid pattern: ${activating.length} activating Receive shapes in Parallel branches. ` +
        'A target workflow has exactly one trigger; split it into several workflows or use correlated receives.',
    };
  }

  return {
    ...base('Invalid'),
    ...primary,
    migrationError:
      `Invalid pattern: ${activating.length} sequential activating Receive shapes. ` +
      'A target workflow has exactly one trigger; redesign as a convoy or split it into several workflows.',
  };
}
