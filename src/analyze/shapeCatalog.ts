import catalogData from './data/shapeCatalog.json';

export type ShapeSupport = 'supported' | 'partial' | 'unsupported' | 'ignored';

export type ShapeCatalogOptions = {
  extraSupported?: readonly string[];
  /** Partially supported kinds are also supported. */
  extraPartial?: readonly string[];
};

function lowerSet(...lists: ReadonlyArray<readonly string[]>): Set<string> {
  return new Set(lists.flat().map((s) => s.toLowerCase()));
}

/**
 * Which shape kinds the migration handles. Lookups ignore case.
 */
export class ShapeCatalog {
  private readonly supported: Set<string>;
  private readonly partial: Set<string>;
  private readonly ignored: Set<string>;

  constructor(opts: ShapeCatalogOptions = {}) {
    const extraPartial = opts.extraPartial ?? [];
    this.supported = lowerSet(catalogData.supported, opts.extraSupported ?? [], extraPartial);
    this.partial = lowerSet(catalogData.partial, extraPartial);
    this.ignored = lowerSet(catalogData.ignored);
  }

  classify(shapeType: string): ShapeSupport {
    const key = shapeType.toLowerCase();
    if (this.ignored.has(key)) return 'ignored';
    if (!this.supported.has(key)) return 'unsupported';
    return this.partial.has(key) ? 'partial' : 'supported';
  }

  isSupported(shapeType: string): boolean {
    const s = this.classify(shapeType);
    return s === 'supported' || s === 'partial';
  }
}

export const DEFAULT_CATALOG = new ShapeCatalog();
