import type { FastifyReply } from 'fastify';
import { FILE_LIMITS } from '@sheetmap/shared';

/** Strip what could break out of the Content-Disposition header */
export function safeFileName(name: string): string {
  return name
    .replace(/[\r\n\t]/g, '')
    .replace(/["\\]/g, '_')
    .replace(/[^\x20-\x7E]/g, '_');
}

export function sendXlsx(reply: FastifyReply, buffer: Buffer, fileName: string): void {
  reply
    .header('Content-Type', FILE_LIMITS.XLSX_MIME_TYPE)
    .header('Content-Disposition', `attachment; filename="${safeFileName(fileName)}"`)
    .header('Content-Length', buffer.length)
    .send(buffer);
}
