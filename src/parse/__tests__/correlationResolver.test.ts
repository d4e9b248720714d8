import type { ParseEvent } from '../events';
import { resolveCorrelations } from '../correlationResolver';
import { parseOrchestration } from '../orchestrationParser';
import { odxFile, shape } from '../../__tests__/fixtures/odxBuilder';

function build() {
  const events: ParseEvent[] = [];
  const model = parseOrchestration(
    odxFile({
      serviceElements: [
        shape('CorrelationDeclaration', { Name: 'OrderSet', Type: 'Demo.OrderCorrelation' }, [
          shape('StatementRef', { Ref: 'r1', Initializes: 'True' }),
          shape('StatementRef', { Ref: 'r2', Initializes: 'False' }),
          shape('StatementRef', { Ref: 'missing' }),
          shape('StatementRef', { Ref: 'sd1', Initializes: 'True' }),
          shape('StatementRef', { Ref: '' }),
        ], 'c1'),
      ],
      body: [
        shape('Receive', { Name: 'First', Activate: 'True' }, [], 'r1'),
        shape('Send', { Name: 'Forward' }, [], 'sd1'),
        shape('Scope', { Name: 'Later' }, [
          shape('CorrelationDeclaration', { Name: 'LineSet' }, [shape('StatementRef', { Ref: 'r2', Initializes: 'True' })], 'c2'),
          shape('Receive', { Name: 'Second' }, [], 'r2'),
        ]),
      ],
    }),
    { onEvent: (e) => events.push(e) },
  );
  return { model, events };
}

describe('resolveCorrelations', () => {
  test('attaches sets to the receives their statements point at', () => {
    const { model } = build();
    const first = model.arena.getAs(model.index.get('r1') ?? -1, 'receive');
    const second = model.arena.getAs(model.index.get('r2') ?? -1, 'receive');
    expect(first?.initializesCorrelationSets).toEqual(['OrderSet']);
    expect(first?.followsCorrelationSets).toEqual([]);
    expect(second?.followsCorrelationSets).toEqual(['OrderSet']);
    expect(second?.initializesCorrelationSets).toEqual(['LineSet']);
  });

  test('statement refs are consumed, not parsed as shapes', () => {
    const { model } = build();
    expect(model.arena.all().map((n) => n.kind)).toEqual([
      'correlationDeclaration',
      'receive',
      'send',
      'scope',
      'correlationDeclaration',
      'receive',
    ]);
  });

  test('reports each statement outcome', () => {
    const { events } = build();
    expect(events.filter((e) => e.type === 'correlation')).toEqual([
      { type: 'correlation', declaration: 'OrderSet', statementOid: 'r1', outcome: 'initializes' },
      { type: 'correlation', declaration: 'OrderSet', statementOid: 'r2', outcome: 'follows' },
      { type: 'correlation', declaration: 'OrderSet', statementOid: 'missing', outcome: 'unresolved' },
      { type: 'correlation', declaration: 'OrderSet', statementOid: 'sd1', outcome: 'notReceive' },
      { type: 'correlation', declaration: 'LineSet', statementOid: 'r2', outcome: 'initializes' },
    ]);
  });

  test('running again adds nothing', () => {
    const { model } = build();
    resolveCorrelations(model.arena, model.index);
    resolveCorrelations(model.arena, model.index);
    const first = model.arena.getAs(model.index.get('r1') ?? -1, 'receive');
    const second = model.arena.getAs(model.index.get('r2') ?? -1, 'receive');
    expect(first?.initializesCorrelationSets).toEqual(['OrderSet']);
    expect(second?.followsCorrelationSets).toEqual(['OrderSet']);
    expect(second?.initializesCorrelationSets).toEqual(['LineSet']);
  });
});
