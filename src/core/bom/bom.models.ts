import type { BomNode } from './bom-node';

export type ItemKind = 'part' | 'assembly';

export type CellValue = string | number | boolean | null;

export interface CatalogRecord {
  partNumber: string;
  name?: string;
  description?: string;
  supplier?: string;
  supplierPartNumber?: string;
  packageQuantity?: number;
  packagePrice?: number;
  kind?: ItemKind;
  attributes?: Record<string, CellValue>;
}

export interface Item {
  partNumber: string;
  name: string;
  description: string;
  supplier: string;
  supplierPartNumber: string;
  packageQuantity: number;
  packagePrice: number;
  kind: ItemKind;
  attributes: Record<string, CellValue>;
}

export interface ItemLink {
  partNumber: string;
  quantity: number;
}

export interface AssemblyRecord {
  partNumber: string;
  rows: ItemLink[];
}

export interface PartOccurrence {
  readonly kind: 'part';
  readonly item: Item;
  readonly quantity: number;
  readonly parent: BomNode;
}

export type BomChild = PartOccurrence | BomNode;

export interface FlatEntry {
  item: Item;
  quantity: number;
  extendedQuantity: number;
  path: string[];
}

export interface SummaryRow {
  partNumber: string;
  name: string;
  description: string;
  supplier: string;
  supplierPartNumber: string;
  packageQuantity: number;
  packagePrice: number;
  totalQuantity: number;
  purchaseQuantity: number;
  extendedCost: number;
}

export interface WorkbookSheet {
  name: string;
  rows: Record<string, unknown>[];
}
