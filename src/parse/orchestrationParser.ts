import path from 'node:path';
import type {
  BindingKind,
  MessageDirection,
  MessageModel,
  NodeHandle,
  OperationKind,
  OperationModel,
  OrchestrationModel,
  PortDirection,
  PortModel,
  PortTypeModel,
} from '../model/orchestration';
import { ElementReader, elementPath, propertyPath } from '../source/elementReader';
import { extractXmlSegment, loadDesignerDocument, readSourceFile } from '../source/sourceExtractor';
import { OrchestrationSection, SectionError, SemanticError } from '../util/errors';
import { resolveCorrelations } from './correlationResolver';
import type { ParseEventSink } from './events';
import { ParserState, createContext } from './parserState';
import { ShapeTreeParser } from './shapeParser';

export type ParseOptions = {
  /** Used in error messages; defaults to `<inline>`. */
  fileLabel?: string;
  onEvent?: ParseEventSink;
};

const MODULE_PATH = "/om:MetaModel/om:Element[@Type='Module']";
const SERVICE_PATH = `${MODULE_PATH}/om:Element[@Type='ServiceDeclaration']`;

export const BODY_CONTEXT = 'body';
export const SERVICE_CONTEXT = 'service';

function inSection<T>(orchestration: string, section: OrchestrationSection, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof SectionError) throw e;
    throw new SectionError(orchestration, section, e);
  }
}

export function mapParamDirection(raw: string): MessageDirection {
  switch (raw) {
    case 'In':
      return 'in';
    case 'Out':
      return 'out';
    case 'InOut':
    case 'Ref':
      return 'inout';
    default:
      return '';
  }
}

export function mapOperationKind(raw: string): OperationKind {
  if (raw === 'OneWay') return 'one-way';
  if (raw === 'RequestResponse') return 'request-response';
  return 'unknown';
}

/** Port direction from the `PortModifier` and `Signal` flags. */
export function portDirection(modifier: string, signal: string): PortDirection {
  if (modifier === 'Implements') return signal === 'True' ? 'receive' : 'receive-send';
  if (modifier === 'Uses') return signal === 'True' ? 'send-receive' : 'send';
  return 'none';
}

const BINDING_ATTRIBUTES: ReadonlyArray<[string, BindingKind]> = [
  ['LogicalBindingAttribute', 'logical'],
  ['PhysicalBindingAttribute', 'physical'],
  ['DirectBindingAttribute', 'direct'],
  ['WebPortBindingAttribute', 'web'],
];

function parseMessages(doc: Document, r: ElementReader): MessageModel[] {
  const out: MessageModel[] = [];
  for (const el of r.select(doc, `${SERVICE_PATH}/${elementPath('MessageDeclaration')}`)) {
    const name = r.property(el, 'Name');
    if (name === '') continue;
    out.push({ name, type: r.property(el, 'Type'), direction: mapParamDirection(r.property(el, 'ParamDirection')) });
  }
  return out;
}

function messageRef(r: ElementReader, op: Element, role: 'Request' | 'Response' | 'Fault'): string {
  return r.evaluate(op, `om:Element[@Type='MessageRef' and om:Property[@Name='Name']/@Value='${role}']/${propertyPath('Ref')}`);
}

function parsePortTypes(doc: Document, r: ElementReader): PortTypeModel[] {
  const out: PortTypeModel[] = [];
  for (const el of r.select(doc, `${MODULE_PATH}/${elementPath('PortType')}`)) {
    const name = r.property(el, 'Name');
    if (name === '') continue;
    const operations: OperationModel[] = [];
    for (const op of r.childElements(el, 'OperationDeclaration')) {
      const opName = r.property(op, 'Name');
      if (opName === '') continue;
      operations.push({
        name: opName,
        kind: mapOperationKind(r.property(op, 'OperationType')),
        requestMessageType: messageRef(r, op, 'Request'),
        responseMessageType: messageRef(r, op, 'Response'),
        faultMessageType: messageRef(r, op, 'Fault'),
      });
    }
    out.push({ name, modifier: r.property(el, 'TypeModifier'), operations });
  }
  return out;
}

function parsePorts(doc: Document, r: ElementReader): PortModel[] {
  const out: PortModel[] = [];
  for (const el of r.select(doc, `${SERVICE_PATH}/${elementPath('PortDeclaration')}`)) {
    const name = r.property(el, 'Name');
    if (name === '') continue;

    const physical = r.selectFirst(el, elementPath('PhysicalBindingAttribute'));
    const web = r.selectFirst(el, elementPath('WebPortBindingAttribute'));
    const adapterName =
      (physical ? r.firstProperty(physical, 'TransportType', 'Adapter', 'AdapterName') : '') ||
      (web ? r.property(web, 'TransportType') : '');
    const binding = BINDING_ATTRIBUTES.find(([type]) => r.childElements(el, type).length > 0);

    out.push({
      name,
      portTypeRef: r.property(el, 'Type'),
      direction: portDirection(r.property(el, 'PortModifier'), r.property(el, 'Signal')),
      bindingKind: binding ? binding[1] : 'unknown',
      isDynamic: physical ? r.property(physical, 'IsDynamic') === 'True' : false,
      adapterName,
      transportType: adapterName,
    });
  }
  return out;
}

/**
 * Parse the raw text of an orchestration file into its model.
 *
 * @throws FormatError when the designer XML cannot be isolated or is malformed
 * @throws SemanticError when no orchestration name is declared
 * @throws SectionError when one of the sections fails to build
 */
export function parseOrchestration(raw: string, opts: ParseOptions = {}): OrchestrationModel {
  const label = opts.fileLabel ?? '<inline>';
  const segment = extractXmlSegment(raw, label);
  const doc = loadDesignerDocument(segment, label, {
    onWarning: (message) => opts.onEvent?.({ type: 'xmlWarning', message }),
  });

  const r = new ElementReader();
  const namespace = r.evaluate(doc, `${MODULE_PATH}/${propertyPath('Name')}`);
  const name = r.evaluate(doc, `${SERVICE_PATH}/${propertyPath('Name')}`);
  if (name === '') {
    throw new SemanticError(`Failed to extract orchestration name from '${path.basename(label)}'`);
  }

  const messages = inSection(name, 'messages', () => parseMessages(doc, r));
  const portTypes = inSection(name, 'portTypes', () => parsePortTypes(doc, r));
  const ports = inSection(name, 'ports', () => parsePorts(doc, r));

  const state = new ParserState(r, opts.onEvent);
  const parser = new ShapeTreeParser(state);

  const declarations = inSection(name, 'shapes', () => {
    const ctx = createContext(SERVICE_CONTEXT);
    const handles: NodeHandle[] = [];
    for (const el of r.select(doc, `${SERVICE_PATH}/${elementPath('VariableDeclaration', 'CorrelationDeclaration')}`)) {
      if (r.property(el, 'Name') === '') continue;
      handles.push(parser.parseElement(el, r.type(el), ctx).handle);
    }
    return handles;
  });

  const body = r.selectFirst(doc, `${SERVICE_PATH}/${elementPath('ServiceBody')}`);
  const nodes = body ? inSection(name, 'shapes', () => parser.parseBody(body, createContext(BODY_CONTEXT))) : [];

  inSection(name, 'correlations', () => resolveCorrelations(state.arena, state.index, opts.onEvent));

  return {
    namespace,
    name,
    fullName: namespace === '' ? name : `${namespace}.${name}`,
    messages,
    portTypes,
    ports,
    declarations,
    nodes,
    arena: state.arena,
    index: state.index,
  };
}

export async function parseOrchestrationFile(filePath: string, opts: ParseOptions = {}): Promise<OrchestrationModel> {
  const source = await readSourceFile(filePath);
  return parseOrchestration(source.text, { ...opts, fileLabel: opts.fileLabel ?? filePath });
}
