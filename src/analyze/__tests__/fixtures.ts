import type { OdxElement } from '../../__tests__/fixtures/odxBuilder';
import { odxFile, shape } from '../../__tests__/fixtures/odxBuilder';

const correlationSet = shape('CorrelationDeclaration', { Name: 'OrderSet', Type: 'Demo.OrderCorrelation' }, [
  shape('StatementRef', { Ref: 'r1', Initializes: 'True' }),
  shape('StatementRef', { Ref: 'r2', Initializes: 'False' }),
]);

const dynamicInPort = shape('PortDeclaration', { Name: 'InPort', Type: 'OrderPortType', PortModifier: 'Implements', Signal: 'False' }, [
  shape('PhysicalBindingAttribute', { IsDynamic: 'True' }),
]);

function aggregatorBody(withConstruct: boolean): OdxElement[] {
  return [
    shape('Receive', { Name: 'Start', Activate: 'True' }, [], 'r1'),
    ...(withConstruct
      ? [
          shape('Construct', { Name: 'Build' }, [
            shape('Transform', { Name: 'Map' }, [
              shape('MessagePartRef', { MessageRef: 'A' }),
              shape('MessagePartRef', { MessageRef: 'B' }),
            ]),
          ]),
        ]
      : []),
    shape('Receive', { Name: 'More' }, [], 'r2'),
    shape('Widget', { Name: 'Gear' }),
  ];
}

/** Two receives joined by a correlation set, a dynamic port, and an unsupported kind. */
export function aggregatorFile(withConstruct = true): string {
  return odxFile({ serviceElements: [correlationSet, dynamicInPort], body: aggregatorBody(withConstruct) });
}

/** Only unsupported kinds. */
export function oddKindsFile(): string {
  return odxFile({ name: 'Odd', body: [shape('Widget'), shape('Gizmo')] });
}

/** Eleven distinct supported kinds and nothing flagged. */
export function complexFile(): string {
  return odxFile({
    name: 'Busy',
    body: [
      shape('Receive', { Name: 'In', Activate: 'True' }),
      shape('Scope', { Name: 'Work' }, [shape('Group', {}, [shape('Expression', {}), shape('Delay', {})])]),
      shape('Send', { Name: 'Out' }),
      shape('Terminate', {}),
      shape('VariableAssignment', {}),
      shape('Decide', { Name: 'D' }),
      shape('Construct', {}, [shape('MessageAssignment', {})]),
    ],
  });
}
