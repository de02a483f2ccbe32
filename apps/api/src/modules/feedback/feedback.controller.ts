import { Controller, Post, Req, Res } from '@nestjs/common';
import { ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { feedbackOptionsSchema, importColumnsSchema, validationResultsSchema } from '@sheetmap/shared';
import { FeedbackService } from './feedback.service';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { jsonField, readMultipartForm } from '../../common/utils/multipart-form';
import { sendXlsx } from '../../common/utils/xlsx-reply';

@ApiTags('feedback')
@Controller('api/feedback')
export class FeedbackController {
  private readonly columnsPipe = new ZodValidationPipe(importColumnsSchema);
  private readonly resultsPipe = new ZodValidationPipe(validationResultsSchema);
  private readonly optionsPipe = new ZodValidationPipe(feedbackOptionsSchema.optional());

  constructor(private readonly feedbackService: FeedbackService) {}

  @Post()
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    summary: 'Annotate a previously produced XLSX with validation results',
    description: 'Form fields: "file", "columns" (JSON), "results" (JSON array) and optional "options" (JSON).',
  })
  @ApiResponse({ status: 200, description: 'Annotated XLSX file' })
  async annotate(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    const form = await readMultipartForm(request.parts());
    const columns = this.columnsPipe.transform(jsonField(form, 'columns'));
    const results = this.resultsPipe.transform(jsonField(form, 'results') ?? []);
    const options = this.optionsPipe.transform(jsonField(form, 'options'));
    const buffer = await this.feedbackService.annotate(form.file, columns, results, options);
    sendXlsx(reply, buffer, form.fileName || 'feedback.xlsx');
  }
}
