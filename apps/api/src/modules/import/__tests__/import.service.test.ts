import { describe, it, expect } from 'vitest';
import { format } from 'date-fns';
import {
  ConfigurationError,
  MissingRequiredColumnError,
  MissingRequiredValueError,
} from '@sheetmap/shared';
import { FieldRegistry } from '../../metadata/field-registry.service';
import { ExportService } from '../../export/export.service';
import { ImportService } from '../import.service';
import {
  LineItem,
  Person,
  SearchParams,
  lineItem,
  person,
  workbookBuffer,
} from '../../../__tests__/fixtures/sample-records';

const registry = new FieldRegistry();
const importer = new ImportService(registry);
const exporter = new ExportService(registry);

const personColumns = [
  { title: 'Name', field: 'fullName' },
  { title: 'Age', field: 'age' },
  { title: 'Born', field: 'born' },
  { title: 'Active', field: 'active' },
];

describe('ImportService.readRecords', () => {
  it('reads back what the exporter wrote', async () => {
    const people = [
      person('Ana', 34, new Date(Date.UTC(1990, 4, 17)), true),
      person('Luis', 41, new Date(Date.UTC(1983, 0, 2)), false),
    ];
    const buffer = await exporter.generateSimple([people]);
    const imported = await importer.readRecords(buffer, personColumns, Person);

    expect(imported.map((r) => r.rowNumber)).toEqual([2, 3]);
    expect(imported[0]?.record).toBeInstanceOf(Person);
    expect(imported.map((r) => r.record)).toEqual(people);
  });

  it('stops at a row holding an end marker', async () => {
    const buffer = await workbookBuffer([
      ['Name', 'Age', 'Born', 'Active'],
      ['Ana', 34, '17/05/1990', 'SI'],
      ['TOTAL', 34],
      ['Zed', 20],
    ]);
    const imported = await importer.readRecords(buffer, personColumns, Person);

    expect(imported).toHaveLength(1);
    const ana = imported[0]?.record;
    expect(ana?.name).toBe('Ana');
    expect(ana?.born ? format(ana.born, 'yyyy-MM-dd') : null).toBe('1990-05-17');
    expect(ana?.active).toBe(true);
  });

  it('stops at caller-supplied sentinels too', async () => {
    const buffer = await workbookBuffer([['Name'], ['Ana'], ['-- end --'], ['Zed']]);
    const imported = await importer.readRecords(buffer, [{ title: 'Name', field: 'name' }], Person, {
      sentinels: ['-- end --'],
    });
    expect(imported.map((r) => r.record.name)).toEqual(['Ana']);
  });

  it('skips blank rows', async () => {
    const buffer = await workbookBuffer([['Name', 'Age'], ['Ana', 30], [], ['Bo', 25]]);
    const imported = await importer.readRecords(buffer, personColumns.slice(0, 2), Person);
    expect(imported.map((r) => [r.rowNumber, r.record.name])).toEqual([[2, 'Ana'], [4, 'Bo']]);
  });

  it('leaves an optional field blank when its cell cannot be read', async () => {
    const buffer = await workbookBuffer([['Name', 'Age'], ['Ana', 'unknown']]);
    const imported = await importer.readRecords(buffer, personColumns.slice(0, 2), Person);
    expect(imported[0]?.record.age).toBeNull();
  });

  it('fails when a required column is missing from the header', async () => {
    const buffer = await workbookBuffer([['Full', 'Age'], ['Ana', 30]]);
    await expect(importer.readRecords(buffer, personColumns, Person)).rejects.toThrow(MissingRequiredColumnError);
  });

  it('fails when a required field has no configured column', async () => {
    const buffer = await workbookBuffer([['Age'], [30]]);
    await expect(importer.readRecords(buffer, [{ title: 'Age', field: 'age' }], Person)).rejects.toThrow(
      'Missing required column "Name"',
    );
  });

  it('fails when a required generality has no configured column', async () => {
    const buffer = await workbookBuffer([['Year', 2024], ['Name', 'Amount'], ['A', 1]]);
    await expect(
      importer.readRecordsWithGeneralities(
        buffer, [{ title: 'Year', field: 'year' }], SearchParams, [{ title: 'Name', field: 'name' }], LineItem, { headerRow: 2 },
      ),
    ).rejects.toThrow(MissingRequiredColumnError);
  });

  it('fails when a required value is blank', async () => {
    const buffer = await workbookBuffer([['Name', 'Age'], ['Ana', 30], [null, 40]]);
    await expect(importer.readRecords(buffer, personColumns.slice(0, 2), Person)).rejects.toThrow(
      'Missing required value for column "Name" at row 3',
    );
  });

  it('matches fields by order when no field name is given', async () => {
    const buffer = await workbookBuffer([['Who', 'Years'], ['Ana', 30]]);
    const imported = await importer.readRecords(buffer, [{ title: 'Who', order: 0 }, { title: 'Years', order: 1 }], Person);
    expect(imported[0]?.record).toMatchObject({ name: 'Ana', age: 30 });
  });

  it('honors header row and start column', async () => {
    const buffer = await workbookBuffer([['Staff'], [], [null, 'Name', 'Age'], [null, 'Ana', 30]]);
    const imported = await importer.readRecords(buffer, personColumns.slice(0, 2), Person, {
      headerRow: 3,
      startColumn: 2,
    });
    expect(imported).toHaveLength(1);
    expect(imported[0]).toMatchObject({ rowNumber: 4, record: { name: 'Ana', age: 30 } });
  });

  it('rejects an empty column configuration', async () => {
    const buffer = await workbookBuffer([['Name'], ['Ana']]);
    await expect(importer.readRecords(buffer, [], Person)).rejects.toThrow(ConfigurationError);
  });

  it('reports an unknown sheet', async () => {
    const buffer = await workbookBuffer([['Name'], ['Ana']]);
    await expect(importer.readRecords(buffer, personColumns, Person, { sheet: 'Missing' }))
      .rejects.toThrow('Sheet "Missing" not found');
  });
});

describe('ImportService.readPlainRecords', () => {
  it('keys values by field or title and coerces them', async () => {
    const buffer = await workbookBuffer([
      ['Product', 'Qty', 'Unit price'],
      ['Pen', '3', '1.234,567'],
    ]);
    const imported = await importer.readPlainRecords(buffer, [
      { title: 'Product', field: 'product' },
      { title: 'Qty', field: 'qty', valueType: 'integer' },
      { title: 'Price', valueType: 'decimal' },
    ]);
    expect(imported).toEqual([{ rowNumber: 2, record: { product: 'Pen', qty: 3, Price: 1234.57 } }]);
  });

  it('checks required columns that have no typed field', async () => {
    const buffer = await workbookBuffer([['Name'], ['Ana']]);
    await expect(
      importer.readPlainRecords(buffer, [{ title: 'Name' }, { title: 'Email', required: true }]),
    ).rejects.toThrow(new MissingRequiredColumnError('Email').message);
  });
});

describe('ImportService.readRecordsWithGeneralities', () => {
  const generalityColumns = [
    { title: 'Region', field: 'region' },
    { title: 'Year', field: 'year' },
  ];
  const itemColumns = [
    { title: 'Name', field: 'name' },
    { title: 'Amount', field: 'amount' },
  ];

  it('reads label/value pairs above the header and the table below', async () => {
    const buffer = await workbookBuffer([
      ['Region', 'North'],
      ['Year', '2024'],
      [],
      ['Name', 'Amount'],
      ['A', 10],
      ['B', 20],
    ]);
    const result = await importer.readRecordsWithGeneralities(
      buffer, generalityColumns, SearchParams, itemColumns, LineItem, { headerRow: 4 },
    );

    expect(result.generalities).toBeInstanceOf(SearchParams);
    expect(result.generalities).toMatchObject({ region: 'North', year: 2024 });
    expect(result.records.map((r) => r.record)).toEqual([lineItem('A', 10), lineItem('B', 20)]);
  });

  it('reads a report produced by the exporter', async () => {
    const buffer = await exporter.generateReport({
      generalities: Object.assign(new SearchParams(), { region: 'North', year: 2024 }),
      summaries: [{ label: 'Grand total', order: 0, columns: ['Amount'], operation: 'sum' }],
      tables: [{ records: [lineItem('A', 10), lineItem('B', 20)] }],
    });
    const result = await importer.readRecordsWithGeneralities(
      buffer, generalityColumns, SearchParams, itemColumns, LineItem, { headerRow: 6 },
    );

    expect(result.generalities).toMatchObject({ region: 'North', year: 2024 });
    expect(result.records.map((r) => r.rowNumber)).toEqual([7, 8]);
  });

  it('fails when a required generality has no value', async () => {
    const buffer = await workbookBuffer([['Region'], ['Name', 'Amount'], ['A', 1]]);
    await expect(
      importer.readRecordsWithGeneralities(buffer, generalityColumns, SearchParams, itemColumns, LineItem, { headerRow: 2 }),
    ).rejects.toThrow(MissingRequiredValueError);
  });

  it('needs the header row below the generalities', async () => {
    const buffer = await workbookBuffer([['Name', 'Amount']]);
    await expect(
      importer.readRecordsWithGeneralities(buffer, generalityColumns, SearchParams, itemColumns, LineItem),
    ).rejects.toThrow(ConfigurationError);
  });
});
