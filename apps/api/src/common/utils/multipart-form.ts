import { BadRequestException } from '@nestjs/common';
import { FILE_LIMITS } from '@sheetmap/shared';

/** The two shapes @fastify/multipart yields while iterating a request's parts */
export type FormPart =
  | { type: 'file'; fieldname: string; filename: string; toBuffer(): Promise<Buffer> }
  | { type: 'field'; fieldname: string; value: unknown };

export interface MultipartForm {
  file: Buffer;
  fileName: string;
  fields: Map<string, string>;
}

/** Collect the uploaded workbook and the text fields sent with it */
export async function readMultipartForm(parts: AsyncIterable<FormPart>): Promise<MultipartForm> {
  let file: Buffer | undefined;
  let fileName = '';
  const fields = new Map<string, string>();

  for await (const part of parts) {
    if (part.type === 'file') {
      if (file) throw new BadRequestException('Only one file can be uploaded');
      const lower = part.filename.toLowerCase();
      if (!FILE_LIMITS.ALLOWED_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
        throw new BadRequestException(`Unsupported file type: ${part.filename}`);
      }
      file = await part.toBuffer();
      fileName = part.filename;
    } else if (typeof part.value === 'string') {
      fields.set(part.fieldname, part.value);
    }
  }

  if (!file) throw new BadRequestException('No file provided');
  return { file, fileName, fields };
}

/** A JSON-encoded form field, undefined when the field was not sent */
export function jsonField(form: MultipartForm, name: string): unknown {
  const raw = form.fields.get(name);
  if (raw === undefined) return undefined;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new BadRequestException(`Field "${name}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}
