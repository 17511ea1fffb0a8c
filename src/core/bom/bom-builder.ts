import { BomNode } from './bom-node';
import {
  CyclicBomError,
  DuplicatePartError,
  InvalidRecordError,
  RootResolutionError,
  UnknownPartError,
  UnresolvedReferenceError,
} from './bom.errors';
import {
  AssemblyRecord,
  BomChild,
  ItemLink,
  WorkbookSheet,
} from './bom.models';
import { Catalog } from './catalog';
import { normalizeAssemblyRows, normalizeCatalogRows } from './catalog-records';

export type AssemblyRows =
  | ReadonlyMap<string, readonly ItemLink[]>
  | readonly AssemblyRecord[];

export interface DuplicateLink {
  assemblyPartNumber: string;
  partNumber: string;
  quantity: number;
}

export interface BuildBomOptions {
  catalog: Catalog;
  assemblies: AssemblyRows;
  /** Root assembly; discovered from the references when omitted. */
  root?: string;
  onDuplicateLink?: (duplicate: DuplicateLink) => void;
}

export function buildBom(options: BuildBomOptions): BomNode {
  const { catalog } = options;
  const rowsByAssembly = collectAssemblyRows(
    options.assemblies,
    options.onDuplicateLink,
  );
  const rootPartNumber = options.root ?? discoverRoot(rowsByAssembly);

  verifyStructure(rootPartNumber, rowsByAssembly, catalog);

  const aggregates = new Map<string, ReadonlyMap<string, number>>();

  const buildNode = (
    partNumber: string,
    links: readonly ItemLink[],
    parent?: BomNode,
    quantityFromParent?: number,
  ): BomNode =>
    new BomNode({
      partNumber,
      links,
      catalog,
      parent,
      quantityFromParent,
      aggregates,
      resolveChildren: (node) =>
        links.map((link): BomChild => {
          const rows = rowsByAssembly.get(link.partNumber);
          if (rows) {
            return buildNode(link.partNumber, rows, node, link.quantity);
          }

          return {
            kind: 'part',
            item: catalog.lookup(link.partNumber),
            quantity: link.quantity,
            parent: node,
          };
        }),
    });

  const rootLinks = rowsByAssembly.get(rootPartNumber);
  if (!rootLinks) {
    throw new UnresolvedReferenceError(rootPartNumber);
  }

  return buildNode(rootPartNumber, rootLinks);
}

/**
 * Resolves every reference below the root and rejects cycles. Each assembly
 * is walked once; a finished assembly has no path back to the current
 * ancestors, so later references to it are skipped.
 */
function verifyStructure(
  rootPartNumber: string,
  rowsByAssembly: ReadonlyMap<string, readonly ItemLink[]>,
  catalog: Catalog,
): void {
  const verified = new Set<string>();

  const visit = (
    partNumber: string,
    ancestors: readonly string[],
    parentPartNumber?: string,
  ): void => {
    const links = rowsByAssembly.get(partNumber);
    if (!links) {
      throw new UnresolvedReferenceError(partNumber, parentPartNumber);
    }

    const path = [...ancestors, partNumber];

    for (const link of links) {
      const start = path.indexOf(link.partNumber);
      if (start >= 0) {
        throw new CyclicBomError([...path.slice(start), link.partNumber]);
      }

      if (rowsByAssembly.has(link.partNumber)) {
        if (!verified.has(link.partNumber)) {
          visit(link.partNumber, path, partNumber);
        }
        continue;
      }

      const item = catalog.find(link.partNumber);
      if (!item) {
        throw new UnknownPartError(link.partNumber, partNumber);
      }

      if (item.kind !== 'part') {
        throw new UnresolvedReferenceError(link.partNumber, partNumber);
      }
    }

    verified.add(partNumber);
  };

  visit(rootPartNumber, []);
}

/**
 * Builds from an ordered list of sheets: the first is the parts list, each
 * later sheet is an assembly named by its part number.
 */
export function loadWorkbook(
  sheets: readonly WorkbookSheet[],
  options: Pick<BuildBomOptions, 'root' | 'onDuplicateLink'> = {},
): BomNode {
  if (sheets.length < 2) {
    throw new InvalidRecordError(
      'A workbook must contain a parts list followed by at least one assembly sheet.',
      { sheets: sheets.length },
    );
  }

  const [partsSheet, ...assemblySheets] = sheets;

  return buildBom({
    catalog: Catalog.fromRecords(normalizeCatalogRows(partsSheet.rows)),
    assemblies: assemblySheets.map((sheet) =>
      normalizeAssemblyRows(sheet.name, sheet.rows),
    ),
    ...options,
  });
}

function collectAssemblyRows(
  assemblies: AssemblyRows,
  onDuplicateLink?: (duplicate: DuplicateLink) => void,
): Map<string, ItemLink[]> {
  const entries: [string, readonly ItemLink[]][] = isAssemblyRecordList(
    assemblies,
  )
    ? assemblies.map((record): [string, readonly ItemLink[]] => [
        record.partNumber,
        record.rows,
      ])
    : [...assemblies.entries()];

  const rowsByAssembly = new Map<string, ItemLink[]>();

  for (const [assemblyPartNumber, rows] of entries) {
    if (rowsByAssembly.has(assemblyPartNumber)) {
      throw new DuplicatePartError(assemblyPartNumber, 'assembly list');
    }

    const merged = new Map<string, ItemLink>();
    for (const row of rows) {
      const existing = merged.get(row.partNumber);
      if (!existing) {
        merged.set(row.partNumber, { ...row });
        continue;
      }

      existing.quantity += row.quantity;
      onDuplicateLink?.({
        assemblyPartNumber,
        partNumber: row.partNumber,
        quantity: existing.quantity,
      });
    }

    rowsByAssembly.set(assemblyPartNumber, [...merged.values()]);
  }

  return rowsByAssembly;
}

function isAssemblyRecordList(
  assemblies: AssemblyRows,
): assemblies is readonly AssemblyRecord[] {
  return Array.isArray(assemblies);
}

function discoverRoot(rowsByAssembly: ReadonlyMap<string, ItemLink[]>): string {
  const referenced = new Set<string>();
  for (const links of rowsByAssembly.values()) {
    for (const link of links) {
      referenced.add(link.partNumber);
    }
  }

  const candidates = [...rowsByAssembly.keys()].filter(
    (partNumber) => !referenced.has(partNumber),
  );

  if (candidates.length === 1) {
    return candidates[0];
  }

  if (candidates.length === 0) {
    const cycle = findCycle(rowsByAssembly);
    if (cycle) {
      throw new CyclicBomError(cycle);
    }
  }

  throw new RootResolutionError(candidates);
}

function findCycle(
  rowsByAssembly: ReadonlyMap<string, ItemLink[]>,
): string[] | undefined {
  const finished = new Set<string>();

  const visit = (partNumber: string, path: string[]): string[] | undefined => {
    const start = path.indexOf(partNumber);
    if (start >= 0) {
      return [...path.slice(start), partNumber];
    }

    if (finished.has(partNumber)) {
      return undefined;
    }

    const links = rowsByAssembly.get(partNumber) ?? [];
    for (const link of links) {
      if (!rowsByAssembly.has(link.partNumber)) {
        continue;
      }

      const cycle = visit(link.partNumber, [...path, partNumber]);
      if (cycle) {
        return cycle;
      }
    }

    finished.add(partNumber);
    return undefined;
  };

  for (const partNumber of rowsByAssembly.keys()) {
    const cycle = visit(partNumber, []);
    if (cycle) {
      return cycle;
    }
  }

  return undefined;
}
