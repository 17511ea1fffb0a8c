import { InvalidRecordError } from './bom.errors';
import {
  AssemblyRecord,
  CatalogRecord,
  CellValue,
  ItemKind,
  ItemLink,
} from './bom.models';

type CatalogField = Exclude<keyof CatalogRecord, 'attributes'>;

const CATALOG_COLUMNS: Record<CatalogField, readonly string[]> = {
  partNumber: ['partNumber', 'PN', 'Part Number'],
  name: ['name', 'Name'],
  description: ['description', 'Description'],
  supplier: ['supplier', 'Supplier'],
  supplierPartNumber: [
    'supplierPartNumber',
    'Supplier PN',
    'Supplier Part Number',
  ],
  packageQuantity: ['packageQuantity', 'Pkg QTY', 'Package QTY'],
  packagePrice: ['packagePrice', 'Pkg Price', 'Package Price'],
  kind: ['kind', 'Type', 'item_type'],
};

const PART_NUMBER_COLUMNS = CATALOG_COLUMNS.partNumber;
const QUANTITY_COLUMNS = ['quantity', 'QTY', 'Qty'] as const;

const KNOWN_CATALOG_COLUMNS = new Set(Object.values(CATALOG_COLUMNS).flat());

export function normalizeCatalogRows(
  rows: readonly Record<string, unknown>[],
): CatalogRecord[] {
  return rows.map((row, index) => {
    const context = `catalog row ${index + 1}`;

    const record: CatalogRecord = {
      partNumber: readPartNumber(row, PART_NUMBER_COLUMNS, context),
      name: readText(row, CATALOG_COLUMNS.name),
      description: readText(row, CATALOG_COLUMNS.description),
      supplier: readText(row, CATALOG_COLUMNS.supplier),
      supplierPartNumber: readText(row, CATALOG_COLUMNS.supplierPartNumber),
      packageQuantity: readPackageQuantity(row, context),
      packagePrice: readPackagePrice(row, context),
      kind: readKind(row, context),
    };

    const attributes: Record<string, CellValue> = {};
    for (const [column, value] of Object.entries(row)) {
      if (KNOWN_CATALOG_COLUMNS.has(column) || isBlank(value)) {
        continue;
      }

      attributes[column] = toCellValue(value, `${context}, column '${column}'`);
    }

    if (Object.keys(attributes).length > 0) {
      record.attributes = attributes;
    }

    return record;
  });
}

export function normalizeAssemblyRows(
  partNumber: string,
  rows: readonly Record<string, unknown>[],
): AssemblyRecord {
  const assemblyPartNumber = partNumber.trim();
  if (!assemblyPartNumber) {
    throw new InvalidRecordError('Assembly part number is required.');
  }

  const links = rows.map((row, index): ItemLink => {
    const context = `assembly '${assemblyPartNumber}' row ${index + 1}`;
    const raw = pick(row, QUANTITY_COLUMNS);
    const quantity = toNumber(raw, `${context}, quantity`);

    if (quantity === undefined || quantity <= 0) {
      throw new InvalidRecordError(
        `Quantity in ${context} must be a positive number.`,
        { assembly: assemblyPartNumber, row: index + 1 },
      );
    }

    return {
      partNumber: readPartNumber(row, PART_NUMBER_COLUMNS, context),
      quantity,
    };
  });

  return { partNumber: assemblyPartNumber, rows: links };
}

function readPartNumber(
  row: Record<string, unknown>,
  columns: readonly string[],
  context: string,
): string {
  const raw = pick(row, columns);
  const partNumber =
    typeof raw === 'number' ? String(raw) : typeof raw === 'string' ? raw.trim() : '';

  if (!partNumber) {
    throw new InvalidRecordError(`Part number is required in ${context}.`, {
      context,
    });
  }

  return partNumber;
}

function readText(
  row: Record<string, unknown>,
  columns: readonly string[],
): string | undefined {
  const raw = pick(row, columns);
  if (isBlank(raw)) {
    return undefined;
  }

  return String(raw).trim();
}

function readPackageQuantity(
  row: Record<string, unknown>,
  context: string,
): number | undefined {
  const value = toNumber(
    pick(row, CATALOG_COLUMNS.packageQuantity),
    `${context}, package quantity`,
  );

  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new InvalidRecordError(
      `Package quantity in ${context} must be an integer >= 1.`,
      { context, packageQuantity: value },
    );
  }

  return value;
}

function readPackagePrice(
  row: Record<string, unknown>,
  context: string,
): number | undefined {
  const value = toNumber(
    pick(row, CATALOG_COLUMNS.packagePrice),
    `${context}, package price`,
  );

  if (value !== undefined && value < 0) {
    throw new InvalidRecordError(
      `Package price in ${context} must not be negative.`,
      { context, packagePrice: value },
    );
  }

  return value;
}

function readKind(
  row: Record<string, unknown>,
  context: string,
): ItemKind | undefined {
  const raw = pick(row, CATALOG_COLUMNS.kind);
  if (isBlank(raw)) {
    return undefined;
  }

  const kind = String(raw).trim().toLowerCase();
  if (kind !== 'part' && kind !== 'assembly') {
    throw new InvalidRecordError(
      `Item kind in ${context} must be 'part' or 'assembly', got '${String(raw)}'.`,
      { context },
    );
  }

  return kind;
}

function pick(row: Record<string, unknown>, columns: readonly string[]): unknown {
  for (const column of columns) {
    if (!isBlank(row[column])) {
      return row[column];
    }
  }

  return undefined;
}

function toNumber(raw: unknown, context: string): number | undefined {
  if (isBlank(raw)) {
    return undefined;
  }

  const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidRecordError(`Expected a number in ${context}.`, {
      context,
    });
  }

  return value;
}

function toCellValue(raw: unknown, context: string): CellValue {
  if (
    raw === null ||
    typeof raw === 'string' ||
    typeof raw === 'number' ||
    typeof raw === 'boolean'
  ) {
    return raw;
  }

  throw new InvalidRecordError(`Unsupported cell value in ${context}.`, {
    context,
  });
}

function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === '')
  );
}
