import {
  DuplicatePartError,
  InvalidRecordError,
  UnknownPartError,
} from './bom.errors';
import { CatalogRecord, Item, ItemKind } from './bom.models';

/**
 * Master parts list. Built once from an ordered list of records and
 * read-only afterwards; every BOM node of a tree shares the same instance.
 */
export class Catalog {
  private readonly itemsByPartNumber = new Map<string, Item>();
  private readonly orderByPartNumber = new Map<string, number>();

  private constructor(private readonly orderedItems: readonly Item[]) {
    orderedItems.forEach((item, index) => {
      if (this.itemsByPartNumber.has(item.partNumber)) {
        throw new DuplicatePartError(item.partNumber);
      }

      this.itemsByPartNumber.set(item.partNumber, item);
      this.orderByPartNumber.set(item.partNumber, index);
    });
  }

  static fromRecords(records: readonly CatalogRecord[]): Catalog {
    return new Catalog(records.map((record, index) => toItem(record, index)));
  }

  get size(): number {
    return this.orderedItems.length;
  }

  get items(): readonly Item[] {
    return this.orderedItems;
  }

  /** Column names present across the catalog, in first-seen order. */
  get fields(): string[] {
    const fields = new Set<string>([
      'partNumber',
      'name',
      'description',
      'supplier',
      'supplierPartNumber',
      'packageQuantity',
      'packagePrice',
      'kind',
    ]);

    for (const item of this.orderedItems) {
      for (const key of Object.keys(item.attributes)) {
        fields.add(key);
      }
    }

    return [...fields];
  }

  find(partNumber: string): Item | undefined {
    return this.itemsByPartNumber.get(partNumber);
  }

  lookup(partNumber: string): Item {
    const item = this.itemsByPartNumber.get(partNumber);
    if (!item) {
      throw new UnknownPartError(partNumber);
    }

    return item;
  }

  kindOf(partNumber: string): ItemKind {
    return this.lookup(partNumber).kind;
  }

  /** Declaration position, or -1 when the part number is not catalogued. */
  indexOf(partNumber: string): number {
    return this.orderByPartNumber.get(partNumber) ?? -1;
  }
}

function toItem(record: CatalogRecord, index: number): Item {
  if (!record.partNumber.trim()) {
    throw new InvalidRecordError(
      `Part number is required in catalog record ${index + 1}.`,
      { record: index + 1 },
    );
  }

  const packageQuantity = record.packageQuantity ?? 1;
  if (!Number.isInteger(packageQuantity) || packageQuantity < 1) {
    throw new InvalidRecordError(
      `Package quantity of '${record.partNumber}' must be an integer >= 1, got ${packageQuantity}.`,
      { partNumber: record.partNumber, packageQuantity },
    );
  }

  const packagePrice = record.packagePrice ?? 0;
  if (!Number.isFinite(packagePrice) || packagePrice < 0) {
    throw new InvalidRecordError(
      `Package price of '${record.partNumber}' must be a non-negative number, got ${packagePrice}.`,
      { partNumber: record.partNumber, packagePrice },
    );
  }

  return Object.freeze({
    partNumber: record.partNumber,
    name: record.name ?? '',
    description: record.description ?? '',
    supplier: record.supplier ?? '',
    supplierPartNumber: record.supplierPartNumber ?? '',
    packageQuantity,
    packagePrice,
    kind: record.kind ?? 'part',
    attributes: Object.freeze({ ...record.attributes }),
  });
}
