import { SummaryRow } from './bom.models';
import type { Catalog } from './catalog';

export function purchaseQuantity(
  totalQuantity: number,
  packageQuantity: number,
): number {
  if (packageQuantity > 1) {
    return Math.ceil(totalQuantity / packageQuantity);
  }

  return totalQuantity;
}

/**
 * One purchasable line per catalogued part in `aggregate`, in catalog order.
 * Assemblies are bought as their parts, never as line items.
 */
export function buildSummary(
  aggregate: ReadonlyMap<string, number>,
  catalog: Catalog,
): SummaryRow[] {
  return [...aggregate.keys()]
    .map((partNumber) => catalog.lookup(partNumber))
    .filter((item) => item.kind === 'part')
    .sort(
      (left, right) =>
        catalog.indexOf(left.partNumber) - catalog.indexOf(right.partNumber),
    )
    .map((item) => {
      const totalQuantity = aggregate.get(item.partNumber) ?? 0;
      const packages = purchaseQuantity(totalQuantity, item.packageQuantity);

      return {
        partNumber: item.partNumber,
        name: item.name,
        description: item.description,
        supplier: item.supplier,
        supplierPartNumber: item.supplierPartNumber,
        packageQuantity: item.packageQuantity,
        packagePrice: item.packagePrice,
        totalQuantity,
        purchaseQuantity: packages,
        extendedCost: packages * item.packagePrice,
      };
    });
}

export function summarizeCost(rows: readonly SummaryRow[]): number {
  return rows.reduce((total, row) => total + row.extendedCost, 0);
}
