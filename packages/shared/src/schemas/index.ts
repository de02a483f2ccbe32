export {
  hexColorSchema,
  booleanLabelsSchema,
  exportOptionsSchema,
  importOptionsSchema,
  feedbackOptionsSchema,
  type ExportOptions,
  type ExportOptionsInput,
  type ImportOptions,
  type ImportOptionsInput,
  type FeedbackOptions,
  type FeedbackOptionsInput,
} from './options-schema';

export {
  specialFieldSchema,
  referenceLabelSchema,
  pivotDefinitionSchema,
  importColumnSchema,
  importColumnsSchema,
  validationResultSchema,
  validationResultsSchema,
  fieldDefinitionSchema,
  tableDefinitionSchema,
  exportRequestSchema,
  type FieldDefinitionInput,
  type TableDefinitionInput,
  type ExportRequestInput,
} from './definition-schema';
