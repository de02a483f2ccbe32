import type { FieldValueType, ImportColumnConfig } from '@sheetmap/shared';

/** A class whose fields carry sheet metadata; instantiated once per imported row */
export type RecordType<T extends object> = new () => T;

/** Where the value of one configured column lands on the record */
export interface FieldBinding {
  key: string;
  /** Configured title, used in error messages */
  title: string;
  valueType: FieldValueType;
  required: boolean;
}

/** How rows become records: typed through field metadata, or plain objects */
export interface RecordTarget<T extends object> {
  /** Name used in log lines */
  readonly name: string;
  /** Texts that end the data block when found in any cell */
  readonly sentinels: ReadonlySet<string>;
  /** Fields that some configured column must bind, whatever the sheet holds */
  readonly requiredFields: readonly { key: string; label: string }[];
  create(): T;
  bind(config: ImportColumnConfig): FieldBinding | null;
}
