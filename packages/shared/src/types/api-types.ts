import type { ImportedRecord, PlainRecord } from './import-types';

/** JSON body of a successful call */
export interface ApiSuccess<T> {
  success: true;
  data: T;
}

/** JSON body of a failed call, XLSX downloads included */
export interface ApiFailure {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/** `data` of POST /api/import */
export interface ImportResult {
  fileName: string;
  records: ImportedRecord<PlainRecord>[];
}
