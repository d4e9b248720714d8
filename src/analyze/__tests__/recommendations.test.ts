import { emptyFlaggedFiles } from '../../report/gapReport';
import { detectPatterns } from '../patternDetector';
import { generateRecommendations } from '../recommendations';

describe('detectPatterns', () => {
  const none = { receive: 0, send: 0, decide: 0, parallel: 0, construct: 0, transform: 0 };

  test('scatter-gather needs a parallel with two sends and two receives', () => {
    expect(detectPatterns({ ...none, parallel: 1, send: 2, receive: 2 }, false).scatterGather).toBe(true);
    expect(detectPatterns({ ...none, parallel: 1, send: 2, receive: 1 }, false).scatterGather).toBe(false);
  });

  test('aggregation needs correlation', () => {
    expect(detectPatterns({ ...none, receive: 2, transform: 1 }, false).aggregator).toBe(false);
    expect(detectPatterns({ ...none, receive: 2, transform: 1 }, true).aggregator).toBe(true);
  });
});

describe('generateRecommendations', () => {
  test('every flag in priority order', () => {
    const filesWith = emptyFlaggedFiles();
    for (const list of Object.values(filesWith)) list.push('x.odx');
    filesWith.businessRules.push('y.odx');

    const recs = generateRecommendations({ filesWith, unsupportedShapeFrequency: {}, unsupportedShapeExamples: {} });

    expect(recs.map((r) => `${r.priority} ${r.title}`)).toEqual([
      'P0 Business Rules Engine Support',
      'P0 Advanced Correlation Support',
      'P1 Convoy Pattern Support',
      'P1 Dynamic Port Support',
      'P1 Compensation Logic Support',
      'P2 Transaction Scope Support',
      'P2 Aggregator Pattern',
      'P2 Content-Based Routing',
      'P2 Scatter-Gather Pattern',
      'P2 Message Broker Pattern',
      'P3 Hybrid Deployment Option',
    ]);
    expect(recs[0]?.detail.startsWith('2 file(s) call business rules.')).toBe(true);
  });

  test('unsupported kinds keep insertion order on ties', () => {
    const recs = generateRecommendations({
      filesWith: emptyFlaggedFiles(),
      unsupportedShapeFrequency: { Beta: 1, Alpha: 3, Gamma: 1 },
      unsupportedShapeExamples: { Alpha: ['a.odx'], Beta: ['b.odx'] },
    });
    expect(recs.slice(1).map((r) => [r.title, r.detail])).toEqual([
      ["Support for 'Alpha' shape", 'Found in 3 file(s): a.odx'],
      ["Support for 'Beta' shape", 'Found in 1 file(s): b.odx'],
      ["Support for 'Gamma' shape", 'Found in 1 file(s): '],
    ]);
  });

  test('example lookups ignore inherited object members', () => {
    const recs = generateRecommendations({
      filesWith: emptyFlaggedFiles(),
      unsupportedShapeFrequency: { toString: 1 },
      unsupportedShapeExamples: {},
    });
    expect(recs[1]).toEqual({ priority: 'P?', title: "Support for 'toString' shape", detail: 'Found in 1 file(s): ' });
  });
});
