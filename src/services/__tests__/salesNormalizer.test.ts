import { describe, it, expect, expectTypeOf } from 'vitest';
import { combineSalesTables, isEmptyRecord, normalizeSalesSheet } from '../salesNormalizer';
import { CANONICAL_FIELDS } from '../salesSchema';
import type { CombinedSaleRecord, SaleRecord } from '../salesSchema';
import { EmptyCorpusError, HeaderNotFoundError } from '../../utils/errors';
import { formatIsoDate } from '../../utils/coerce';

const MANHATTAN_2019 = [
  ['Manhattan Annualized Sales Update', null, null, null, null, null, null, null],
  ['All Sales From 2019', null, null, null, null, null, null, null],
  [null, null, null, null, null, null, null, null],
  [
    'BOROUGH',
    'NEIGHBORHOOD',
    'TAX CLASS AS OF FINAL ROLL 18/19',
    'BLOCK',
    'LOT',
    'EASE-MENT',
    'SALE PRICE',
    'SALE DATE',
  ],
  [1, 'CHELSEA', '2A', 700, 1012, null, 1250000, 43570],
  [1, 'CHELSEA', 2, '701', '12', null, '1,200', '4/18/2019'],
  [null, null, null, null, null, null, null, null],
  [1, 'SOHO', '4', 'n/a', 5, 'E', null, 'unknown'],
];

describe('normalizeSalesSheet', () => {
  const records = normalizeSalesSheet(MANHATTAN_2019);

  it('starts after the located header row and drops fully empty rows', () => {
    expect(records).toHaveLength(3);
    expect(records.map((r) => r.neighborhood)).toEqual(['CHELSEA', 'CHELSEA', 'SOHO']);
  });

  it('exposes exactly the canonical fields, in order', () => {
    for (const record of records) {
      expect(Object.keys(record)).toEqual([...CANONICAL_FIELDS]);
    }
  });

  it('back-fills fields the sheet does not have with null', () => {
    for (const record of records) {
      expect(record.address).toBeNull();
      expect(record.zip_code).toBeNull();
      expect(record.year_built).toBeNull();
      expect(record.building_class_at_time_of_sale).toBeNull();
    }
  });

  it('renames year-tagged and misspelt headers', () => {
    expect(records.map((r) => r.tax_class_at_present)).toEqual(['2A', 2, '4']);
    expect(records[2].easement).toBe('E');
  });

  it('coerces numeric columns without raising', () => {
    expect(records[0].sale_price).toBe(1250000);
    expect(records[1].sale_price).toBeNull();
    expect(records[1].block).toBe(701);
    expect(records[1].lot).toBe(12);
    expect(records[2].block).toBeNull();
    expect(records[2].sale_price).toBeNull();
  });

  it('coerces sale dates without raising', () => {
    const dates = records.map((r) => (r.sale_date ? formatIsoDate(r.sale_date) : null));
    expect(dates).toEqual(['2019-04-15', '2019-04-18', null]);
  });

  it('keeps text cells as read', () => {
    expect(records[0].borough).toBe(1);
    expect(records[0].neighborhood).toBe('CHELSEA');
  });

  it('drops extra source columns', () => {
    const out = normalizeSalesSheet([
      ['BOROUGH', 'BLOCK', 'INTERNAL NOTES', 'Lot'],
      [3, 10, 'call back', 20],
    ]);
    expect(out).toHaveLength(1);
    expect(Object.keys(out[0])).not.toContain('internal notes');
    expect(out[0]).toMatchObject({ borough: 3, block: 10, lot: 20 });
  });

  it('drops a row whose only values sit in non-canonical columns', () => {
    const out = normalizeSalesSheet([
      ['BOROUGH', 'NOTES'],
      [null, 'orphan note'],
      [4, null],
    ]);
    expect(out.map((r) => r.borough)).toEqual([4]);
  });

  it('treats empty-string cells as empty', () => {
    const out = normalizeSalesSheet([['BOROUGH', 'ADDRESS'], ['', ''], [5, '']]);
    expect(out).toHaveLength(1);
    expect(out[0].address).toBeNull();
  });

  it('takes the leftmost column when two headers map to the same field', () => {
    const out = normalizeSalesSheet([
      ['BOROUGH', 'TAX CLASS AT PRESENT', 'Tax Class As Of Final Roll 18/19'],
      [2, '1', '1A'],
    ]);
    expect(out[0].tax_class_at_present).toBe('1');
  });

  it('reads short rows as empty in the missing cells', () => {
    const out = normalizeSalesSheet([['BOROUGH', 'BLOCK', 'LOT'], [1]]);
    expect(out[0]).toMatchObject({ borough: 1, block: null, lot: null });
  });

  it('throws HeaderNotFoundError when the keyword is outside the window', () => {
    const rows = [...Array.from({ length: 10 }, () => ['title']), ['BOROUGH'], [1]];
    expect(() => normalizeSalesSheet(rows, { source: 'late.xlsx' })).toThrow(HeaderNotFoundError);
  });

  it('uses a custom alias map and header keyword', () => {
    const out = normalizeSalesSheet(
      [
        ['Boro', 'Price'],
        ['2', '900000'],
      ],
      { headerKeyword: 'boro', aliases: { boro: 'borough', price: 'sale_price' } }
    );
    expect(out[0]).toMatchObject({ borough: '2', sale_price: 900000 });
  });
});

describe('isEmptyRecord', () => {
  it('is true only when every field is null', () => {
    const [record] = normalizeSalesSheet([['BOROUGH'], [1]]);
    expect(isEmptyRecord(record)).toBe(false);
    expect(isEmptyRecord({ ...record, borough: null })).toBe(true);
  });
});

describe('combineSalesTables', () => {
  const first = normalizeSalesSheet([
    ['BOROUGH', 'Block', 'Lot'],
    [1, 100, 5],
    [1, '200', 7],
  ]);
  const second = normalizeSalesSheet([
    ['Brooklyn Annualized Sales'],
    ['Borough', 'block', 'LOT', 'Sale Price'],
    [3, 300, 1, 500000],
    [null, null, null, null],
    [3, '400', '2', ' 750000 '],
  ]);

  it('concatenates files in order into the canonical shape', () => {
    const combined = combineSalesTables([first, second]);
    expect(combined).toHaveLength(first.length + second.length);
    expect(combined).toHaveLength(4);
    for (const record of combined) {
      expect(Object.keys(record).sort()).toEqual([...CANONICAL_FIELDS].sort());
    }
    expect(combined.map((r) => r.block)).toEqual([100, 200, 300, 400]);
    expect(combined.map((r) => r.sale_price)).toEqual([null, null, 500000, 750000]);
  });

  it('ignores skipped files', () => {
    const combined = combineSalesTables([null, first, null]);
    expect(combined.map((r) => r.lot)).toEqual([5, 7]);
  });

  it('keeps a file that produced no rows without failing', () => {
    expect(combineSalesTables([[]])).toEqual([]);
  });

  it('throws EmptyCorpusError when every file was skipped', () => {
    expect(() => combineSalesTables([null, null])).toThrow(EmptyCorpusError);
    expect(() => combineSalesTables([])).toThrow(EmptyCorpusError);
  });

  it('does not deduplicate identical rows', () => {
    expect(combineSalesTables([first, first])).toHaveLength(4);
  });

  it('forces tax class at present and apartment number to text', () => {
    const base: SaleRecord = first[0];
    const combined = combineSalesTables([
      [
        { ...base, tax_class_at_present: 2, apartment_number: 14 },
        { ...base, tax_class_at_present: '2A', apartment_number: '4B' },
        { ...base, tax_class_at_present: null, apartment_number: null },
      ],
    ]);
    expect(combined.map((r) => r.tax_class_at_present)).toEqual(['2', '2A', '']);
    expect(combined.map((r) => r.apartment_number)).toEqual(['14', '4B', '']);
  });
});

describe('record field types', () => {
  it('types the coerced and forced-text fields', () => {
    expectTypeOf<SaleRecord['zip_code']>().toEqualTypeOf<number | null>();
    expectTypeOf<SaleRecord['sale_price']>().toEqualTypeOf<number | null>();
    expectTypeOf<SaleRecord['sale_date']>().toEqualTypeOf<Date | null>();
    expectTypeOf<SaleRecord['apartment_number']>().toEqualTypeOf<string | number | boolean | null>();
    expectTypeOf<CombinedSaleRecord['apartment_number']>().toEqualTypeOf<string>();
    expectTypeOf<CombinedSaleRecord['tax_class_at_present']>().toEqualTypeOf<string>();
    expectTypeOf<CombinedSaleRecord['block']>().toEqualTypeOf<number | null>();
  });
});
