import * as xpath from 'xpath';

/** Namespace of the orchestration designer document. */
export const DESIGNER_NAMESPACE = 'http://schemas.microsoft.com/BizTalk/2003/DesignerData';

export type NamespaceMap = Record<string, string>;

type XPathSelect = ReturnType<typeof xpath.useNamespaces>;

/** XPath to the `Value` of a named `Property` child. */
export function propertyPath(name: string): string {
  return `om:Property[@Name='${name}']/@Value`;
}

/** XPath to direct `Element` children, optionally restricted to the given `Type`s. */
export function elementPath(...types: string[]): string {
  if (types.length === 0) return 'om:Element';
  return `om:Element[${types.map((t) => `@Type='${t}'`).join(' or ')}]`;
}

/**
 * Thin accessor over the generic Element/Property schema.
 *
 * Everything above it is built from `select` (all matches) and `evaluate`
 * (string value of the first match, or `''`), plus the `Type`/`OID` attributes.
 */
export class ElementReader {
  private readonly selectFn: XPathSelect;

  constructor(namespaces: NamespaceMap = { om: DESIGNER_NAMESPACE }) {
    this.selectFn = xpath.useNamespaces(namespaces);
  }

  select(context: Node, path: string): Element[] {
    const result = this.selectFn(path, context);
    if (!xpath.isArrayOfNodes(result)) return [];
    return result.filter(xpath.isElement);
  }

  selectFirst(context: Node, path: string): Element | undefined {
    return this.select(context, path)[0];
  }

  evaluate(context: Node, path: string): string {
    const result = this.selectFn(path, context);
    if (xpath.isArrayOfNodes(result)) {
      const first = result[0];
      if (!first) return '';
      if (xpath.isAttribute(first)) return first.value;
      return first.textContent ?? '';
    }
    if (typeof result === 'string') return result;
    if (typeof result === 'number' || typeof result === 'boolean') return String(result);
    return '';
  }

  property(el: Element, name: string): string {
    return this.evaluate(el, propertyPath(name));
  }

  /** First non-empty property among the given names. */
  firstProperty(el: Element, ...names: string[]): string {
    for (const n of names) {
      const v = this.property(el, n);
      if (v !== '') return v;
    }
    return '';
  }

  childElements(el: Element, ...types: string[]): Element[] {
    return this.select(el, elementPath(...types));
  }

  type(el: Element): string {
    return el.getAttribute('Type') ?? '';
  }

  oid(el: Element): string {
    return el.getAttribute('OID') ?? '';
  }
}
