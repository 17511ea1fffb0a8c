import { aggregateQuantities, flattenParts } from './bom-aggregate';
import { NotDirectChildError } from './bom.errors';
import {
  BomChild,
  FlatEntry,
  Item,
  ItemLink,
  PartOccurrence,
  SummaryRow,
} from './bom.models';
import { buildSummary } from './bom-summary';
import { renderTree } from './bom-tree';
import { Catalog } from './catalog';

export interface BomNodeInit {
  partNumber: string;
  links: readonly ItemLink[];
  catalog: Catalog;
  parent?: BomNode;
  quantityFromParent?: number;
  resolveChildren: (node: BomNode) => BomChild[];
  /** Aggregates keyed by assembly part number, shared by every node of a tree. */
  aggregates?: Map<string, ReadonlyMap<string, number>>;
}

/**
 * One assembly in a resolved BOM tree. Children are resolved on first access
 * and kept; aggregates are memoised per assembly part number, so a
 * sub-assembly used on many paths is totalled once.
 */
export class BomNode {
  readonly kind = 'assembly' as const;
  readonly partNumber: string;
  readonly links: readonly ItemLink[];
  readonly catalog: Catalog;
  readonly parent?: BomNode;
  readonly quantityFromParent?: number;

  private readonly resolveChildren: (node: BomNode) => BomChild[];
  private readonly aggregates: Map<string, ReadonlyMap<string, number>>;
  private resolvedChildren?: readonly BomChild[];

  constructor(init: BomNodeInit) {
    this.partNumber = init.partNumber;
    this.links = Object.freeze([...init.links]);
    this.catalog = init.catalog;
    this.parent = init.parent;
    this.quantityFromParent = init.quantityFromParent;
    this.resolveChildren = init.resolveChildren;
    this.aggregates =
      init.aggregates ?? new Map<string, ReadonlyMap<string, number>>();
  }

  get children(): readonly BomChild[] {
    if (!this.resolvedChildren) {
      this.resolvedChildren = Object.freeze(this.resolveChildren(this));
    }

    return this.resolvedChildren;
  }

  /** Catalog entry for this assembly, when the catalog lists one. */
  get item(): Item | undefined {
    return this.catalog.find(this.partNumber);
  }

  get name(): string {
    return this.item?.name ?? '';
  }

  get depth(): number {
    return this.parent ? this.parent.depth + 1 : 0;
  }

  get parts(): PartOccurrence[] {
    return this.children.filter(
      (child): child is PartOccurrence => child.kind === 'part',
    );
  }

  get assemblies(): BomNode[] {
    return this.children.filter(
      (child): child is BomNode => child.kind === 'assembly',
    );
  }

  /** Quantity declared directly in this assembly; not a flattened total. */
  qty(partNumber: string): number {
    const link = this.links.find((entry) => entry.partNumber === partNumber);
    if (!link) {
      throw new NotDirectChildError(partNumber, this.partNumber);
    }

    return link.quantity;
  }

  flat(): Iterable<FlatEntry> {
    return {
      [Symbol.iterator]: () => flattenParts(this),
    };
  }

  get aggregate(): Map<string, number> {
    let totals = this.aggregates.get(this.partNumber);
    if (!totals) {
      totals = aggregateQuantities(this);
      this.aggregates.set(this.partNumber, totals);
    }

    return new Map(totals);
  }

  get summary(): SummaryRow[] {
    return buildSummary(this.aggregate, this.catalog);
  }

  get tree(): string {
    return renderTree(this);
  }

  toString(): string {
    return this.partNumber;
  }
}
