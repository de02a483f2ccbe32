import { Controller, Post, Req } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyRequest } from 'fastify';
import { importColumnsSchema, importOptionsSchema } from '@sheetmap/shared';
import type { ImportResult } from '@sheetmap/shared';
import { ImportService } from './import.service';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { jsonField, readMultipartForm } from '../../common/utils/multipart-form';
import type { EnvConfig } from '../../config/env.config';

@ApiTags('import')
@Controller('api/import')
export class ImportController {
  private readonly columnsPipe = new ZodValidationPipe(importColumnsSchema);
  private readonly optionsPipe = new ZodValidationPipe(importOptionsSchema.partial().optional());

  constructor(
    private readonly importService: ImportService,
    private readonly config: ConfigService<EnvConfig, true>,
  ) {}

  @Post()
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    summary: 'Read records from an XLSX upload',
    description: 'Form fields: "file", "columns" (JSON column configuration) and optional "options" (JSON).',
  })
  @ApiResponse({ status: 201, description: 'Records with the sheet row each came from' })
  @ApiResponse({ status: 422, description: 'Missing required column or value' })
  async import(@Req() request: FastifyRequest): Promise<ImportResult> {
    const form = await readMultipartForm(request.parts());
    const columns = this.columnsPipe.transform(jsonField(form, 'columns'));
    const options = this.optionsPipe.transform(jsonField(form, 'options'));
    const records = await this.importService.readPlainRecords(form.file, columns, {
      ...options,
      decimalSeparator: options?.decimalSeparator ?? this.config.get('IMPORT_DECIMAL_SEPARATOR', { infer: true }),
      dateFormat: options?.dateFormat ?? this.config.get('IMPORT_DATE_FORMAT', { infer: true }),
    });
    return { fileName: form.fileName, records };
  }
}
