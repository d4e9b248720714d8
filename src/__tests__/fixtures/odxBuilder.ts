import { DESIGNER_NAMESPACE } from '../../source/elementReader';

export type Props = Record<string, string>;

export type OdxElement = {
  type: string;
  oid?: string;
  props: Props;
  children: OdxElement[];
};

export function shape(type: string, props: Props = {}, children: OdxElement[] = [], oid?: string): OdxElement {
  return { type, oid, props, children };
}

function escapeAttr(v: string): string {
  return v.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function renderElement(e: OdxElement, depth = 0): string {
  const pad = '    '.repeat(depth);
  const oid = e.oid === undefined ? '' : ` OID="${escapeAttr(e.oid)}"`;
  const lines = [`${pad}<om:Element Type="${escapeAttr(e.type)}"${oid}>`];
  for (const [name, value] of Object.entries(e.props)) {
    lines.push(`${pad}    <om:Property Name="${escapeAttr(name)}" Value="${escapeAttr(value)}" />`);
  }
  for (const c of e.children) lines.push(renderElement(c, depth + 1));
  lines.push(`${pad}</om:Element>`);
  return lines.join('\n');
}

export type OdxDocumentParts = {
  namespace?: string;
  /** Omit the service name property entirely when null. */
  name?: string | null;
  /** PortType and other module-level elements. */
  moduleElements?: OdxElement[];
  /** Messages, ports and declarations beside the body. */
  serviceElements?: OdxElement[];
  body?: OdxElement[];
};

/** Designer XML only, from the declaration to the closing root tag. */
export function designerXml(parts: OdxDocumentParts = {}): string {
  const serviceProps: Props = parts.name === null ? {} : { Name: parts.name ?? 'OrderFlow' };
  const service = shape('ServiceDeclaration', serviceProps, [
    ...(parts.serviceElements ?? []),
    shape('ServiceBody', {}, parts.body ?? []),
  ]);
  const module = shape('Module', { Name: parts.namespace ?? 'Demo.Flows' }, [...(parts.moduleElements ?? []), service]);
  return [
    '<?xml version="1.0" encoding="utf-16"?>',
    `<om:MetaModel MajorVersion="1" MinorVersion="3" xmlns:om="${DESIGNER_NAMESPACE}">`,
    renderElement(module, 1),
    '</om:MetaModel>',
  ].join('\n');
}

export const FILE_PREAMBLE = '#if __DESIGNER_DATA\n#error Do not define __DESIGNER_DATA.\n';
export const FILE_TRAILER = '\n#endif // __DESIGNER_DATA\nmodule Demo.Flows\n{\n}\n';

/** A complete orchestration file: preamble, designer XML, sentinel and trailing code. */
export function odxFile(parts: OdxDocumentParts = {}): string {
  return `${FILE_PREAMBLE}${designerXml(parts)}${FILE_TRAILER}`;
}

/** The value `fn` throws, or undefined when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
