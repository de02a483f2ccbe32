import { Body, Controller, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import { exportRequestSchema } from '@sheetmap/shared';
import type { ExportRequestInput, TableDefinitionInput } from '@sheetmap/shared';
import { ExportService } from './export.service';
import { toFieldSpec } from '../metadata/field-registry.service';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { sendXlsx } from '../../common/utils/xlsx-reply';
import type { TableDefinition } from './export.types';

@ApiTags('export')
@Controller('api/export')
export class ExportController {
  constructor(private readonly exportService: ExportService) {}

  @Post()
  @ApiOperation({
    summary: 'Generate XLSX from table definitions',
    description: 'Each table carries its records and inline field declarations, plus optional special columns, labels and a pivot.',
  })
  @ApiResponse({ status: 200, description: 'XLSX file' })
  @ApiResponse({ status: 422, description: 'Invalid request body or table configuration' })
  async export(
    @Body(new ZodValidationPipe(exportRequestSchema)) body: ExportRequestInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const buffer = await this.exportService.generateTables(body.tables.map(toTableDefinition), body.options);
    sendXlsx(reply, buffer, 'export.xlsx');
  }
}

function toTableDefinition(input: TableDefinitionInput): TableDefinition {
  const { fields, ...rest } = input;
  return { ...rest, fields: fields.map(toFieldSpec) };
}
