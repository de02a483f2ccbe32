import { describe, it, expect } from 'vitest';
import { FieldRegistry, toFieldSpec } from '../field-registry.service';
import { SheetColumn, SheetFormula } from '../sheet-metadata.decorators';
import { Invoice, LineItem, Person, Sale } from '../../../__tests__/fixtures/sample-records';

class RenamedSale extends Sale {
  @SheetColumn({ order: 2, label: 'Total', category: 'currency' })
  override amount = 0;
}

class Orphan {
  @SheetFormula({ operation: 'sum', fields: ['a', 'b'] })
  total = 0;
}

describe('FieldRegistry', () => {
  it('derives specs sorted by order with category defaults', () => {
    const specs = new FieldRegistry().resolve(LineItem);
    expect(specs).toEqual([
      {
        key: 'name', order: 0, label: 'Name', category: 'text', required: false,
        aliases: [], valueType: 'string', excluded: false, exported: true,
      },
      {
        key: 'amount', order: 1, label: 'Amount', category: 'number', required: false,
        aliases: [], valueType: 'number', excluded: false, exported: true,
      },
    ]);
  });

  it('caches specs per type', () => {
    const registry = new FieldRegistry();
    expect(registry.resolve(Sale)).toBe(registry.resolve(Sale));
  });

  it('merges import metadata and keeps sentinel fields out of the export', () => {
    const registry = new FieldRegistry();
    const specs = registry.resolve(Person);
    expect(specs.map((s) => s.key)).toEqual(['name', 'age', 'born', 'active', 'total']);

    const name = specs[0];
    expect(name?.required).toBe(true);
    expect(name?.aliases).toEqual(['fullName']);
    expect(specs.find((s) => s.key === 'born')?.valueType).toBe('date');

    const total = specs.find((s) => s.key === 'total');
    expect(total).toMatchObject({ excluded: true, exported: false, aliases: ['TOTAL'] });
    expect(registry.exportable(Person).map((s) => s.key)).toEqual(['name', 'age', 'born', 'active']);
  });

  it('reads row formulas', () => {
    const gross = new FieldRegistry().resolve(Invoice).find((s) => s.key === 'gross');
    expect(gross?.category).toBe('formula');
    expect(gross?.formula).toEqual({ operation: 'sum', fields: ['net', 'tax'], category: 'number' });
  });

  it('lets a subclass redeclare a field without touching its parent', () => {
    const registry = new FieldRegistry();
    expect(registry.resolve(RenamedSale).map((s) => s.label)).toEqual(['Region', 'Product', 'Total']);
    expect(registry.resolve(Sale).map((s) => s.label)).toEqual(['Region', 'Product', 'Amount']);
  });

  it('skips a formula declared without a column', () => {
    expect(new FieldRegistry().resolve(Orphan)).toEqual([]);
  });

  it('returns the declared table name', () => {
    const registry = new FieldRegistry();
    expect(registry.tableName(Sale)).toBe('Sales');
    expect(registry.tableName(LineItem)).toBeUndefined();
  });
});

describe('toFieldSpec', () => {
  it('builds a spec from an inline definition', () => {
    expect(toFieldSpec({ key: 'price', order: 1, category: 'currency', color: '#FFEEDD' })).toEqual({
      key: 'price', order: 1, label: 'price', category: 'currency', color: '#FFEEDD',
      required: false, aliases: [], valueType: 'decimal', excluded: false, exported: true,
    });
  });

  it('treats an inline formula on a text field as a formula column', () => {
    const spec = toFieldSpec({
      key: 'total', label: 'Total', order: 2, category: 'text',
      formula: { operation: 'sum', fields: ['a', 'b'], category: 'number' },
    });
    expect(spec.category).toBe('formula');
    expect(spec.formula).toEqual({ operation: 'sum', fields: ['a', 'b'], category: 'number' });
  });
});
