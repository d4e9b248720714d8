import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { findMessageType } from '../../model/orchestration';
import { ErrorCode, FormatError, SemanticError } from '../../util/errors';
import type { ParseEvent } from '../events';
import { mapOperationKind, mapParamDirection, parseOrchestration, parseOrchestrationFile, portDirection } from '../orchestrationParser';
import { FILE_PREAMBLE, odxFile, shape, thrownBy } from '../../__tests__/fixtures/odxBuilder';

const moduleElements = [
  shape('PortType', { Name: 'OrderPortType', TypeModifier: 'Internal' }, [
    shape('OperationDeclaration', { Name: 'Submit', OperationType: 'RequestResponse' }, [
      shape('MessageRef', { Name: 'Request', Ref: 'Schemas.Order' }),
      shape('MessageRef', { Name: 'Response', Ref: 'Schemas.Ack' }),
    ]),
    shape('OperationDeclaration', { Name: 'Notify', OperationType: 'OneWay' }, [
      shape('MessageRef', { Name: 'Request', Ref: 'Schemas.Note' }),
    ]),
    shape('OperationDeclaration', { Name: '' }),
  ]),
  shape('PortType', { Name: '' }),
];

const serviceElements = [
  shape('MessageDeclaration', { Name: 'OrderMsg', Type: 'Schemas.Order', ParamDirection: 'In' }),
  shape('MessageDeclaration', { Name: '', Type: 'Schemas.Skipped' }),
  shape('MessageDeclaration', { Name: 'AckMsg', Type: 'Schemas.Ack', ParamDirection: 'Ref' }),
  shape('PortDeclaration', { Name: 'InPort', Type: 'OrderPortType', PortModifier: 'Implements', Signal: 'False' }, [
    shape('LogicalBindingAttribute'),
  ]),
  shape('PortDeclaration', { Name: 'OutPort', Type: 'OrderPortType', PortModifier: 'Uses', Signal: 'False' }, [
    shape('PhysicalBindingAttribute', { TransportType: '', Adapter: 'FILE', IsDynamic: 'True' }),
  ]),
  shape('PortDeclaration', { Name: 'WebPort', Type: 'OrderPortType', PortModifier: 'Implements', Signal: 'True' }, [
    shape('WebPortBindingAttribute', { TransportType: 'SOAP' }),
  ]),
  shape('VariableDeclaration', { Name: 'count', Type: 'System.Int32', UseDefaultConstructor: 'True' }, [], 'v1'),
  shape('VariableDeclaration', { Name: '' }, [], 'v2'),
  shape('CorrelationDeclaration', { Name: 'OrderSet', Type: 'Demo.OrderCorrelation' }, [], 'c1'),
];

describe('parseOrchestration sections', () => {
  const model = parseOrchestration(
    odxFile({ moduleElements, serviceElements, body: [shape('Receive', { Name: 'Start', Activate: 'True' }, [], 'r1')] }),
    { fileLabel: 'OrderFlow.odx' },
  );

  test('names', () => {
    expect(model.namespace).toBe('Demo.Flows');
    expect(model.name).toBe('OrderFlow');
    expect(model.fullName).toBe('Demo.Flows.OrderFlow');
  });

  test('messages skip unnamed declarations', () => {
    expect(model.messages).toEqual([
      { name: 'OrderMsg', type: 'Schemas.Order', direction: 'in' },
      { name: 'AckMsg', type: 'Schemas.Ack', direction: 'inout' },
    ]);
    expect(findMessageType(model, 'AckMsg')).toBe('Schemas.Ack');
    expect(findMessageType(model, 'Unknown')).toBe('Unknown');
  });

  test('port types carry their operations', () => {
    expect(model.portTypes).toEqual([
      {
        name: 'OrderPortType',
        modifier: 'Internal',
        operations: [
          {
            name: 'Submit',
            kind: 'request-response',
            requestMessageType: 'Schemas.Order',
            responseMessageType: 'Schemas.Ack',
            faultMessageType: '',
          },
          {
            name: 'Notify',
            kind: 'one-way',
            requestMessageType: 'Schemas.Note',
            responseMessageType: '',
            faultMessageType: '',
          },
        ],
      },
    ]);
  });

  test('ports read direction, binding and adapter', () => {
    expect(
      model.ports.map((p) => ({
        name: p.name,
        direction: p.direction,
        bindingKind: p.bindingKind,
        isDynamic: p.isDynamic,
        adapterName: p.adapterName,
      })),
    ).toEqual([
      { name: 'InPort', direction: 'receive-send', bindingKind: 'logical', isDynamic: false, adapterName: '' },
      { name: 'OutPort', direction: 'send', bindingKind: 'physical', isDynamic: true, adapterName: 'FILE' },
      { name: 'WebPort', direction: 'receive', bindingKind: 'web', isDynamic: false, adapterName: 'SOAP' },
    ]);
    expect(model.ports[0]?.portTypeRef).toBe('OrderPortType');
  });

  test('service-level declarations are parsed in their own context and indexed', () => {
    const decls = model.arena.resolve(model.declarations);
    expect(decls.map((d) => [d.kind, d.name, d.key])).toEqual([
      ['variableDeclaration', 'count', 'v1|service|0'],
      ['correlationDeclaration', 'OrderSet', 'c1|service|1'],
    ]);
    expect(model.arena.getAs(model.declarations[0] ?? -1, 'variableDeclaration')?.useDefault).toBe('True');
    expect(model.index.get('c1')).toBe(1);
    expect(model.index.has('v2')).toBe(false);
  });

  test('the body starts its own counter', () => {
    expect(model.nodes).toEqual([2]);
    expect(model.arena.get(2).key).toBe('r1|body|0');
  });
});

describe('parseOrchestration mappings', () => {
  test('parameter directions', () => {
    expect(['In', 'Out', 'InOut', 'Ref', 'Other'].map(mapParamDirection)).toEqual(['in', 'out', 'inout', 'inout', '']);
  });

  test('operation kinds', () => {
    expect(['OneWay', 'RequestResponse', 'Solicit'].map(mapOperationKind)).toEqual(['one-way', 'request-response', 'unknown']);
  });

  test('port directions', () => {
    expect(portDirection('Implements', 'True')).toBe('receive');
    expect(portDirection('Implements', 'False')).toBe('receive-send');
    expect(portDirection('Uses', 'True')).toBe('send-receive');
    expect(portDirection('Uses', 'False')).toBe('send');
    expect(portDirection('', 'True')).toBe('none');
  });
});

describe('parseOrchestration edge cases', () => {
  test('an empty namespace leaves the bare name', () => {
    const model = parseOrchestration(odxFile({ namespace: '' }));
    expect(model.fullName).toBe('OrderFlow');
  });

  test('an empty body yields no nodes', () => {
    const model = parseOrchestration(odxFile());
    expect(model.nodes).toEqual([]);
    expect(model.arena.size).toBe(0);
  });

  test('a missing orchestration name is a semantic error', () => {
    const caught = thrownBy(() => parseOrchestration(odxFile({ name: null }), { fileLabel: 'flows/Nameless.odx' }));
    if (!(caught instanceof SemanticError)) throw new Error('expected a SemanticError');
    expect(caught.code).toBe(ErrorCode.SEMANTIC_ERROR);
    expect(caught.message).toBe("Failed to extract orchestration name from 'Nameless.odx'");
  });

  test('a missing sentinel fails before the XML is parsed', () => {
    const raw = `${FILE_PREAMBLE}<?xml version="1.0"?>\n<unclosed>\n`;
    expect(thrownBy(() => parseOrchestration(raw, { fileLabel: 'Cut.odx' }))).toBeInstanceOf(FormatError);
    expect(() => parseOrchestration(raw, { fileLabel: 'Cut.odx' })).toThrow(
      "Invalid orchestration file 'Cut.odx': missing '#endif' sentinel",
    );
  });

  test('the default label is used in messages', () => {
    expect(() => parseOrchestration('no xml here')).toThrow("Invalid orchestration file '<inline>': missing XML declaration");
  });

  test('shape events report every node', () => {
    const events: ParseEvent[] = [];
    parseOrchestration(odxFile({ body: [shape('Send', { Name: 'Out' }, [], 's1')] }), { onEvent: (e) => events.push(e) });
    expect(events.filter((e) => e.type === 'shape')).toEqual([{ type: 'shape', shapeType: 'Send', oid: 's1', name: 'Out', contextPath: 'body', sequence: 0 }]);
  });
});

describe('parseOrchestrationFile', () => {
  test('reads and parses a file from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'odx-parse-'));
    const file = path.join(dir, 'Disk.odx');
    await fs.writeFile(file, odxFile({ name: 'DiskFlow' }), 'utf8');

    const model = await parseOrchestrationFile(file);
    expect(model.fullName).toBe('Demo.Flows.DiskFlow');
  });

  test('a missing name names the file it came from', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'odx-parse-'));
    const file = path.join(dir, 'Anon.odx');
    await fs.writeFile(file, odxFile({ name: null }), 'utf8');

    await expect(parseOrchestrationFile(file)).rejects.toThrow("Failed to extract orchestration name from 'Anon.odx'");
  });
});
