import { Injectable, Logger } from '@nestjs/common';
import type ExcelJS from 'exceljs';
import type {
  CellScalar,
  FieldSpec,
  ImportColumnConfig,
  ImportedRecord,
  ImportOptions,
  ImportOptionsInput,
  ImportWithGeneralities,
  PlainRecord,
  RowStatus,
} from '@sheetmap/shared';
import {
  CellCoercionError,
  ConfigurationError,
  MissingRequiredColumnError,
  MissingRequiredValueError,
  importOptionsSchema,
} from '@sheetmap/shared';
import { FieldRegistry } from '../metadata/field-registry.service';
import { parseOptions } from '../../common/utils/parse-options';
import { openWorksheet } from '../../common/utils/workbook-io';
import { matchColumns, headerMatches } from './column-resolver';
import { readCellText, readCellValue } from './cell-reader';
import { coerceValue } from './value-coercer';
import type { FieldBinding, RecordTarget, RecordType } from './import.types';

@Injectable()
export class ImportService {
  private readonly logger = new Logger(ImportService.name);

  constructor(private readonly registry: FieldRegistry) {}

  /** Records of a decorated type, one per data row below the header */
  async readRecords<T extends object>(
    buffer: Buffer,
    columns: readonly ImportColumnConfig[],
    type: RecordType<T>,
    options?: ImportOptionsInput,
  ): Promise<ImportedRecord<T>[]> {
    const opts = parseOptions(importOptionsSchema, options, 'import options');
    const { worksheet } = await openWorksheet(buffer, opts.sheet);
    return this.readTable(worksheet, columns, this.typedTarget(type, opts), opts);
  }

  /** Records as plain objects keyed by `field`, or by the column title when absent */
  async readPlainRecords(
    buffer: Buffer,
    columns: readonly ImportColumnConfig[],
    options?: ImportOptionsInput,
  ): Promise<ImportedRecord<PlainRecord>[]> {
    const opts = parseOptions(importOptionsSchema, options, 'import options');
    const { worksheet } = await openWorksheet(buffer, opts.sheet);
    return this.readTable(worksheet, columns, plainTarget(opts), opts);
  }

  /**
   * Label/value pairs above the header row fill the generalities object;
   * the table below the header fills the records.
   */
  async readRecordsWithGeneralities<G extends object, T extends object>(
    buffer: Buffer,
    generalityColumns: readonly ImportColumnConfig[],
    generalitiesType: RecordType<G>,
    columns: readonly ImportColumnConfig[],
    type: RecordType<T>,
    options?: ImportOptionsInput,
  ): Promise<ImportWithGeneralities<G, T>> {
    const opts = parseOptions(importOptionsSchema, options, 'import options');
    if (opts.headerRow < 2) {
      throw new ConfigurationError('Generalities need a header row below them', { headerRow: opts.headerRow });
    }
    const { worksheet } = await openWorksheet(buffer, opts.sheet);
    const generalities = this.readGeneralities(worksheet, generalityColumns, this.typedTarget(generalitiesType, opts), opts);
    const records = this.readTable(worksheet, columns, this.typedTarget(type, opts), opts);
    return { generalities, records };
  }

  private readTable<T extends object>(
    worksheet: ExcelJS.Worksheet,
    columns: readonly ImportColumnConfig[],
    target: RecordTarget<T>,
    opts: ImportOptions,
  ): ImportedRecord<T>[] {
    const bindings = this.bindColumns(columns, target);
    const match = matchColumns(worksheet.getRow(opts.headerRow), columns, opts.startColumn);
    for (const config of match.unmatched) {
      if (isRequired(config, bindings)) throw new MissingRequiredColumnError(config.title);
    }

    const mapped = new Map<number, FieldBinding>();
    for (const [col, config] of match.byColumn) {
      const binding = bindings.get(config);
      if (binding) mapped.set(col, binding);
    }

    const records: ImportedRecord<T>[] = [];
    for (let rowNumber = opts.headerRow + 1; rowNumber <= worksheet.rowCount; rowNumber++) {
      const row = worksheet.getRow(rowNumber);
      const record = target.create();
      const filled = new Set<FieldBinding>();
      let status: RowStatus = 'empty';

      for (let col = opts.startColumn; col <= row.cellCount; col++) {
        const raw = readCellValue(row.getCell(col));
        if (raw === null) continue;
        if (typeof raw === 'string' && target.sentinels.has(raw)) {
          status = 'special';
          break;
        }
        const binding = mapped.get(col);
        if (!binding) continue;
        const value = this.coerce(raw, binding, rowNumber, opts);
        if (value === null) continue;
        Reflect.set(record, binding.key, value);
        filled.add(binding);
        status = 'values';
      }

      if (status === 'special') {
        this.logger.debug(`${target.name}: end marker at row ${rowNumber}`);
        break;
      }
      if (status === 'empty') continue;

      for (const binding of mapped.values()) {
        if (binding.required && !filled.has(binding)) {
          throw new MissingRequiredValueError(binding.title, rowNumber);
        }
      }
      records.push({ rowNumber, record });
    }

    this.logger.log(`${target.name}: ${records.length} record(s) from "${worksheet.name}"`);
    return records;
  }

  /** One label cell followed by its value cell per row, above the header row */
  private readGeneralities<G extends object>(
    worksheet: ExcelJS.Worksheet,
    columns: readonly ImportColumnConfig[],
    target: RecordTarget<G>,
    opts: ImportOptions,
  ): G {
    const bindings = this.bindColumns(columns, target);
    const remaining = [...columns];
    const record = target.create();

    for (let rowNumber = 1; rowNumber < opts.headerRow; rowNumber++) {
      const row = worksheet.getRow(rowNumber);
      let labelCol = opts.startColumn;
      while (labelCol <= row.cellCount && !readCellText(row.getCell(labelCol))) labelCol++;
      if (labelCol > row.cellCount) continue;

      const label = readCellText(row.getCell(labelCol));
      const index = remaining.findIndex((config) => headerMatches(label, config));
      if (index === -1) continue;
      const [config] = remaining.splice(index, 1);
      const binding = config ? bindings.get(config) : undefined;
      if (!binding) continue;

      const value = this.coerce(readCellValue(row.getCell(labelCol + 1)), binding, rowNumber, opts);
      if (value === null) {
        if (binding.required) throw new MissingRequiredValueError(binding.title, rowNumber);
        continue;
      }
      Reflect.set(record, binding.key, value);
    }

    for (const config of remaining) {
      if (isRequired(config, bindings)) throw new MissingRequiredColumnError(config.title);
    }
    return record;
  }

  private bindColumns<T extends object>(
    columns: readonly ImportColumnConfig[],
    target: RecordTarget<T>,
  ): Map<ImportColumnConfig, FieldBinding> {
    if (columns.length === 0) {
      throw new ConfigurationError('At least one column is required');
    }
    const bindings = new Map<ImportColumnConfig, FieldBinding>();
    for (const config of columns) {
      const binding = target.bind(config);
      if (binding) {
        bindings.set(config, binding);
      } else {
        this.logger.warn(`${target.name}: column "${config.title}" has no matching field; ignored`);
      }
    }
    const boundKeys = new Set([...bindings.values()].map((b) => b.key));
    const unbound = target.requiredFields.find((field) => !boundKeys.has(field.key));
    if (unbound) {
      throw new MissingRequiredColumnError(unbound.label);
    }
    return bindings;
  }

  /** Unreadable values count as blank; the required check reports them */
  private coerce(raw: CellScalar, binding: FieldBinding, rowNumber: number, opts: ImportOptions): CellScalar {
    try {
      return coerceValue(raw, binding.valueType, opts);
    } catch (err) {
      if (!(err instanceof CellCoercionError)) throw err;
      this.logger.debug(`Row ${rowNumber}, "${binding.title}": ${err.message}`);
      return null;
    }
  }

  private typedTarget<T extends object>(type: RecordType<T>, opts: ImportOptions): RecordTarget<T> {
    const specs = this.registry.resolve(type);
    const sentinels = new Set<string>(opts.sentinels);
    for (const spec of specs) {
      if (spec.excluded) spec.aliases.forEach((alias) => sentinels.add(alias));
    }
    return {
      name: type.name,
      sentinels,
      requiredFields: specs
        .filter((spec) => spec.required && !spec.excluded)
        .map((spec) => ({ key: spec.key, label: spec.label })),
      create: () => new type(),
      bind: (config) => {
        const spec = findSpec(specs, config);
        if (!spec) return null;
        return {
          key: spec.key,
          title: config.title,
          valueType: config.valueType ?? spec.valueType,
          required: config.required ?? spec.required,
        };
      },
    };
  }
}

function isRequired(config: ImportColumnConfig, bindings: Map<ImportColumnConfig, FieldBinding>): boolean {
  return bindings.get(config)?.required ?? config.required ?? false;
}

/** By field key or alias, then by declared order, then by the column title */
function findSpec(specs: FieldSpec[], config: ImportColumnConfig): FieldSpec | undefined {
  const candidates = specs.filter((s) => !s.excluded);
  if (config.field !== undefined) {
    const name = config.field;
    const byName = candidates.find((s) => s.key === name || s.aliases.includes(name));
    if (byName) return byName;
  }
  if (config.order !== undefined) {
    const byOrder = candidates.find((s) => s.order === config.order);
    if (byOrder) return byOrder;
  }
  if (config.field === undefined && config.order === undefined) {
    const title = config.title.trim().toLowerCase();
    return candidates.find(
      (s) => s.key.toLowerCase() === title || s.label.toLowerCase() === title || s.aliases.some((a) => a.toLowerCase() === title),
    );
  }
  return undefined;
}

function plainTarget(opts: ImportOptions): RecordTarget<PlainRecord> {
  return {
    name: 'PlainRecord',
    sentinels: new Set(opts.sentinels),
    requiredFields: [],
    create: () => ({}),
    bind: (config) => ({
      key: config.field ?? config.title,
      title: config.title,
      valueType: config.valueType ?? 'string',
      required: config.required ?? false,
    }),
  };
}
