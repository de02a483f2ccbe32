import { z } from 'zod';
import {
  DATA_CATEGORIES,
  OPERATIONS,
  FIELD_VALUE_TYPES,
  PIVOT_AGGREGATES,
} from '../types/field-types';
import { VALIDATION_STATUSES } from '../types/import-types';
import { hexColorSchema, exportOptionsSchema } from './options-schema';

export const specialFieldSchema = z.object({
  label: z.string().min(1),
  order: z.number().int().min(0),
  columns: z.array(z.string().min(1)).min(1),
  operation: z.enum(OPERATIONS),
  formula: z.string().min(1).optional(),
  category: z.enum(DATA_CATEGORIES).optional(),
}).refine(
  (s) => s.operation !== 'custom' || s.formula !== undefined,
  { message: 'A custom operation needs a formula template', path: ['formula'] },
);

export const referenceLabelSchema = z.object({
  text: z.string().min(1),
  bold: z.boolean().optional(),
});

export const pivotDefinitionSchema = z.object({
  conditionColumns: z.array(z.string().min(1)).min(1),
  valueColumns: z.array(z.string().min(1)).min(1),
  label: z.string().min(1).optional(),
  sheet: z.string().min(1).optional(),
  header: z.boolean().optional(),
  aggregate: z.enum(PIVOT_AGGREGATES).optional(),
  specialField: specialFieldSchema.optional(),
});

export const importColumnSchema = z.object({
  title: z.string().min(1),
  field: z.string().min(1).optional(),
  order: z.number().int().min(0).optional(),
  valueType: z.enum(FIELD_VALUE_TYPES).optional(),
  required: z.boolean().optional(),
});

export const importColumnsSchema = z.array(importColumnSchema).min(1, 'At least one column is required');

export const validationResultSchema = z.object({
  row: z.number().int().min(1),
  column: z.string().min(1).optional(),
  status: z.enum(VALIDATION_STATUSES),
  message: z.string().optional(),
});

export const validationResultsSchema = z.array(validationResultSchema);

/** Field declared inline, for records that carry no decorators */
export const fieldDefinitionSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1).optional(),
  order: z.number().int().min(0),
  category: z.enum(DATA_CATEGORIES).default('text'),
  color: hexColorSchema.optional(),
  formula: z.object({
    operation: z.enum(OPERATIONS),
    fields: z.array(z.string().min(1)).min(1),
    template: z.string().min(1).optional(),
    category: z.enum(DATA_CATEGORIES).default('number'),
  }).optional(),
});

const jsonScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const tableDefinitionSchema = z.object({
  sheet: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
  header: z.boolean().optional(),
  fields: z.array(fieldDefinitionSchema).min(1),
  records: z.array(z.record(jsonScalarSchema)).min(1, 'A table needs at least one record'),
  referenceLabels: z.array(referenceLabelSchema).optional(),
  specialFields: z.array(specialFieldSchema).optional(),
  pivot: pivotDefinitionSchema.optional(),
});

export const exportRequestSchema = z.object({
  tables: z.array(tableDefinitionSchema).min(1),
  options: exportOptionsSchema.partial().optional(),
});

export type FieldDefinitionInput = z.infer<typeof fieldDefinitionSchema>;
export type TableDefinitionInput = z.infer<typeof tableDefinitionSchema>;
export type ExportRequestInput = z.infer<typeof exportRequestSchema>;
