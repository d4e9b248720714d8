import type { GapReport, Recommendation } from '../report/gapReport';
import { ownValue } from '../report/reportBuilder';

type RecommendationInput = Pick<GapReport, 'filesWith' | 'unsupportedShapeFrequency' | 'unsupportedShapeExamples'>;

type FlagRule = {
  files: (r: RecommendationInput) => string[];
  priority: Recommendation['priority'];
  title: string;
  detail: (n: number) => string;
};

const FLAG_RULES: readonly FlagRule[] = [
  {
    files: (r) => r.filesWith.businessRules,
    priority: 'P0',
    title: 'Business Rules Engine Support',
    detail: (n) => `${n} file(s) call business rules. Provide a rules-engine integration in the target runtime.`,
  },
  {
    files: (r) => r.filesWith.correlation,
    priority: 'P0',
    title: 'Advanced Correlation Support',
    detail: (n) => `${n} file(s) use correlation sets. Map correlation onto stateful workflow state.`,
  },
  {
    files: (r) => r.filesWith.convoy,
    priority: 'P1',
    title: 'Convoy Pattern Support',
    detail: (n) => `${n} file(s) use convoy patterns. Convert them with session-enabled queues.`,
  },
  {
    files: (r) => r.filesWith.dynamicPorts,
    priority: 'P1',
    title: 'Dynamic Port Support',
    detail: (n) => `${n} file(s) use dynamic ports. Implement late-bound connector selection.`,
  },
  {
    files: (r) => r.filesWith.compensation,
    priority: 'P1',
    title: 'Compensation Logic Support',
    detail: (n) => `${n} file(s) use compensation. Implement compensating steps in scope error handlers.`,
  },
  {
    files: (r) => r.filesWith.transactions,
    priority: 'P2',
    title: 'Transaction Scope Support',
    detail: (n) => `${n} file(s) use transactions. Document how transaction boundaries become scopes with error handling.`,
  },
  {
    files: (r) => r.filesWith.aggregator,
    priority: 'P2',
    title: 'Aggregator Pattern',
    detail: (n) => `${n} file(s) implement the aggregator pattern. Convert with a stateful workflow fed by session-enabled queues.`,
  },
  {
    files: (r) => r.filesWith.contentBasedRouting,
    priority: 'P2',
    title: 'Content-Based Routing',
    detail: (n) => `${n} file(s) use content-based routing. Implement with switch or condition actions on message content.`,
  },
  {
    files: (r) => r.filesWith.scatterGather,
    priority: 'P2',
    title: 'Scatter-Gather Pattern',
    detail: (n) => `${n} file(s) implement scatter-gather. Fan out with parallel branches and join the replies in one step.`,
  },
  {
    files: (r) => r.filesWith.messageBroker,
    priority: 'P2',
    title: 'Message Broker Pattern',
    detail: (n) => `${n} file(s) implement a message broker. Consider topics with filtered subscriptions for routing.`,
  },
];

const HYBRID_DEPLOYMENT: Recommendation = {
  priority: 'P3',
  title: 'Hybrid Deployment Option',
  detail: 'Consider a self-hosted deployment of the target runtime where data residency or latency rules out a cloud-only setup.',
};

/**
 * Prioritized recommendations for the flags that fired across the file set, the
 * standing deployment note, then one entry per unsupported kind, most frequent first.
 */
export function generateRecommendations(input: RecommendationInput): Recommendation[] {
  const out: Recommendation[] = [];
  for (const rule of FLAG_RULES) {
    const n = rule.files(input).length;
    if (n > 0) out.push({ priority: rule.priority, title: rule.title, detail: rule.detail(n) });
  }
  out.push({ ...HYBRID_DEPLOYMENT });

  const unsupported = Object.entries(input.unsupportedShapeFrequency).sort((a, b) => b[1] - a[1]);
  for (const [shape, count] of unsupported) {
    const examples = (ownValue(input.unsupportedShapeExamples, shape) ?? []).join(', ');
    out.push({
      priority: 'P?',
      title: `Support for '${shape}' shape`,
      detail: `Found in ${count} file(s): ${examples}`,
    });
  }
  return out;
}
