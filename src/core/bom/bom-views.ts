import { BomNode } from './bom-node';
import { SummaryRow } from './bom.models';
import { summarizeCost } from './bom-summary';

export const BOM_VIEWS = [
  'tree',
  'parts',
  'assemblies',
  'flat',
  'aggregate',
  'summary',
] as const;

export type BomView = (typeof BOM_VIEWS)[number];

export interface PartLine {
  partNumber: string;
  name: string;
  quantity: number;
}

export interface AssemblyLine {
  partNumber: string;
  name: string;
  quantity: number;
  childCount: number;
}

export interface FlatLine extends PartLine {
  extendedQuantity: number;
  path: string[];
}

export interface AssemblyOverview {
  partNumber: string;
  name: string;
  depth: number;
  quantityFromParent?: number;
}

export type BomViewResult =
  | { view: 'tree'; partNumber: string; tree: string }
  | { view: 'parts'; partNumber: string; parts: PartLine[] }
  | { view: 'assemblies'; partNumber: string; assemblies: AssemblyLine[] }
  | { view: 'flat'; partNumber: string; flat: FlatLine[] }
  | { view: 'aggregate'; partNumber: string; aggregate: Record<string, number> }
  | {
      view: 'summary';
      partNumber: string;
      summary: SummaryRow[];
      totalCost: number;
    };

export function isBomView(value: string): value is BomView {
  return BOM_VIEWS.some((view) => view === value);
}

export function renderView(node: BomNode, view: BomView): BomViewResult {
  const { partNumber } = node;

  switch (view) {
    case 'tree':
      return { view, partNumber, tree: node.tree };
    case 'parts':
      return {
        view,
        partNumber,
        parts: node.parts.map((part) => ({
          partNumber: part.item.partNumber,
          name: part.item.name,
          quantity: part.quantity,
        })),
      };
    case 'assemblies':
      return {
        view,
        partNumber,
        assemblies: node.assemblies.map((assembly) => ({
          partNumber: assembly.partNumber,
          name: assembly.name,
          quantity: assembly.quantityFromParent ?? 1,
          childCount: assembly.children.length,
        })),
      };
    case 'flat':
      return {
        view,
        partNumber,
        flat: [...node.flat()].map((entry) => ({
          partNumber: entry.item.partNumber,
          name: entry.item.name,
          quantity: entry.quantity,
          extendedQuantity: entry.extendedQuantity,
          path: entry.path,
        })),
      };
    case 'aggregate':
      return {
        view,
        partNumber,
        aggregate: Object.fromEntries(node.aggregate),
      };
    case 'summary': {
      const summary = node.summary;
      return { view, partNumber, summary, totalCost: summarizeCost(summary) };
    }
  }
}

/** Every assembly under `root`, depth-first, root first. */
export function collectAssemblies(root: BomNode): BomNode[] {
  return [root, ...root.assemblies.flatMap((child) => collectAssemblies(child))];
}

/**
 * One node per assembly part number, in depth-first order of first use. A
 * shared sub-assembly is expanded only once.
 */
export function distinctAssemblies(root: BomNode): BomNode[] {
  const byPartNumber = new Map<string, BomNode>();

  const visit = (node: BomNode): void => {
    if (byPartNumber.has(node.partNumber)) {
      return;
    }

    byPartNumber.set(node.partNumber, node);
    node.assemblies.forEach(visit);
  };

  visit(root);
  return [...byPartNumber.values()];
}

export function findAssembly(
  root: BomNode,
  partNumber: string,
): BomNode | undefined {
  return distinctAssemblies(root).find((node) => node.partNumber === partNumber);
}

export function describeAssemblies(root: BomNode): AssemblyOverview[] {
  return collectAssemblies(root).map((node) => {
    const overview: AssemblyOverview = {
      partNumber: node.partNumber,
      name: node.name,
      depth: node.depth - root.depth,
    };

    if (node.quantityFromParent !== undefined && node !== root) {
      overview.quantityFromParent = node.quantityFromParent;
    }

    return overview;
  });
}
