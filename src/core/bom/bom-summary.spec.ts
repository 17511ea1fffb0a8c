import { loadWorkbook } from './bom-builder';
import { UnknownPartError } from './bom.errors';
import { buildSummary, purchaseQuantity, summarizeCost } from './bom-summary';
import { Catalog } from './catalog';
import skateboard from './sample-data/skateboard.json';

describe('purchaseQuantity', () => {
  it.each([
    [8, 4, 2],
    [8, 25, 1],
    [8, 1, 8],
    [9, 4, 3],
    [2.5, 1, 2.5],
  ])('needs %p units in packages of %p -> %p', (total, pkg, expected) => {
    expect(purchaseQuantity(total, pkg)).toBe(expected);
  });
});

describe('buildSummary', () => {
  it('produces catalog-ordered rows for the skateboard', () => {
    const root = loadWorkbook(skateboard.sheets);
    const rows = root.summary;

    expect(
      rows.map((row) => [
        row.partNumber,
        row.totalQuantity,
        row.purchaseQuantity,
        row.extendedCost,
      ]),
    ).toEqual([
      ['SK1001-01', 1, 1, 45],
      ['SK1002-01', 2, 2, 37],
      ['SK1003-01', 16, 2, 24],
      ['SK1004-01', 8, 2, 40],
      ['SK1005-01', 8, 1, 3.5],
      ['SK1006-01', 8, 1, 2.75],
      ['SK1007-01', 1, 1, 9.25],
    ]);
    expect(summarizeCost(rows)).toBe(161.5);
  });

  it('carries the descriptive catalog attributes', () => {
    const [deck] = loadWorkbook(skateboard.sheets).summary;

    expect(deck).toEqual({
      partNumber: 'SK1001-01',
      name: 'Deck',
      description: '8.25in maple deck',
      supplier: 'Boardworks',
      supplierPartNumber: 'BW-825',
      packageQuantity: 1,
      packagePrice: 45,
      totalQuantity: 1,
      purchaseQuantity: 1,
      extendedCost: 45,
    });
  });

  it('skips assemblies and follows catalog order rather than aggregate order', () => {
    const catalog = Catalog.fromRecords([
      { partNumber: 'A', packagePrice: 2 },
      { partNumber: 'KIT', kind: 'assembly', packagePrice: 100 },
      { partNumber: 'B', packageQuantity: 10, packagePrice: 5 },
    ]);

    const rows = buildSummary(
      new Map([
        ['B', 12],
        ['KIT', 1],
        ['A', 3],
      ]),
      catalog,
    );

    expect(rows.map((row) => row.partNumber)).toEqual(['A', 'B']);
    expect(rows[1]).toMatchObject({
      totalQuantity: 12,
      purchaseQuantity: 2,
      extendedCost: 10,
    });
  });

  it('fails for a part number the catalog does not know', () => {
    expect(() =>
      buildSummary(new Map([['GHOST', 1]]), Catalog.fromRecords([])),
    ).toThrow(UnknownPartError);
  });
});
