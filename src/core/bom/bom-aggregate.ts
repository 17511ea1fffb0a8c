import type { BomNode } from './bom-node';
import { FlatEntry } from './bom.models';

/**
 * Walks the subtree depth-first in declared order and yields one entry per
 * part link. A part used in two sub-assemblies is yielded twice.
 */
export function* flattenParts(
  node: BomNode,
  multiplier = 1,
  path: readonly string[] = [node.partNumber],
): Generator<FlatEntry, void, undefined> {
  for (const child of node.children) {
    if (child.kind === 'part') {
      yield {
        item: child.item,
        quantity: child.quantity,
        extendedQuantity: multiplier * child.quantity,
        path: [...path],
      };
      continue;
    }

    const usedQuantity = child.quantityFromParent ?? 1;
    yield* flattenParts(child, multiplier * usedQuantity, [
      ...path,
      child.partNumber,
    ]);
  }
}

/**
 * Total quantity per part number below `node`. Sub-assembly totals are
 * scaled by the quantity the sub-assembly is used in before merging.
 */
export function aggregateQuantities(node: BomNode): Map<string, number> {
  const totals = new Map<string, number>();

  for (const child of node.children) {
    if (child.kind === 'part') {
      addQuantity(totals, child.item.partNumber, child.quantity);
      continue;
    }

    const usedQuantity = child.quantityFromParent ?? 1;
    for (const [partNumber, quantity] of child.aggregate) {
      addQuantity(totals, partNumber, quantity * usedQuantity);
    }
  }

  return totals;
}

function addQuantity(
  totals: Map<string, number>,
  partNumber: string,
  quantity: number,
): void {
  totals.set(partNumber, (totals.get(partNumber) ?? 0) + quantity);
}
