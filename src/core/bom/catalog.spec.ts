import {
  DuplicatePartError,
  InvalidRecordError,
  UnknownPartError,
} from './bom.errors';
import { Catalog } from './catalog';

describe('Catalog', () => {
  const catalog = Catalog.fromRecords([
    { partNumber: 'ASM-1', name: 'Frame', kind: 'assembly' },
    {
      partNumber: 'P-10',
      name: 'Bolt',
      supplier: 'Fastenall',
      packageQuantity: 50,
      packagePrice: 4.5,
      attributes: { Material: 'Steel' },
    },
    { partNumber: 'P-20', name: 'Washer' },
  ]);

  it('applies defaults to missing attributes', () => {
    expect(catalog.lookup('P-20')).toEqual({
      partNumber: 'P-20',
      name: 'Washer',
      description: '',
      supplier: '',
      supplierPartNumber: '',
      packageQuantity: 1,
      packagePrice: 0,
      kind: 'part',
      attributes: {},
    });
  });

  it('keeps declaration order', () => {
    expect(catalog.items.map((item) => item.partNumber)).toEqual([
      'ASM-1',
      'P-10',
      'P-20',
    ]);
    expect(catalog.indexOf('P-20')).toBe(2);
    expect(catalog.indexOf('P-99')).toBe(-1);
    expect(catalog.size).toBe(3);
  });

  it('reports the kind of an item', () => {
    expect(catalog.kindOf('ASM-1')).toBe('assembly');
    expect(catalog.kindOf('P-10')).toBe('part');
  });

  it('throws UnknownPartError for a missing part number', () => {
    expect(() => catalog.lookup('P-99')).toThrow(UnknownPartError);
    expect(() => catalog.kindOf('P-99')).toThrow("Unable to find part 'P-99'.");
    expect(catalog.find('P-99')).toBeUndefined();
  });

  it('lists the standard fields followed by extra columns', () => {
    expect(catalog.fields).toEqual([
      'partNumber',
      'name',
      'description',
      'supplier',
      'supplierPartNumber',
      'packageQuantity',
      'packagePrice',
      'kind',
      'Material',
    ]);
  });

  it('rejects duplicate part numbers', () => {
    expect(() =>
      Catalog.fromRecords([{ partNumber: 'P-1' }, { partNumber: 'P-1' }]),
    ).toThrow(DuplicatePartError);
  });

  it('rejects a record without a part number', () => {
    const build = () =>
      Catalog.fromRecords([{ partNumber: 'P-1' }, { partNumber: '  ' }]);

    expect(build).toThrow(InvalidRecordError);
    expect(build).toThrow('Part number is required in catalog record 2.');
  });

  it.each([0, 2.5, -3])('rejects a package quantity of %p', (packageQuantity) => {
    expect(() =>
      Catalog.fromRecords([{ partNumber: 'P-1', packageQuantity }]),
    ).toThrow(
      `Package quantity of 'P-1' must be an integer >= 1, got ${packageQuantity}.`,
    );
  });

  it('rejects a negative package price', () => {
    let caught: unknown;
    try {
      Catalog.fromRecords([{ partNumber: 'P-1', packagePrice: -5 }]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidRecordError);
    expect(caught).toMatchObject({
      message: "Package price of 'P-1' must be a non-negative number, got -5.",
      details: { partNumber: 'P-1', packagePrice: -5 },
    });
  });

  it('does not allow items to be mutated', () => {
    const item = catalog.lookup('P-10');

    expect(Object.isFrozen(item)).toBe(true);
    expect(Object.isFrozen(item.attributes)).toBe(true);
  });
});
