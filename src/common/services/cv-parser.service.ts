import { Injectable, Logger } from '@nestjs/common';

export interface UploadedCv {
  originalname?: string;
  mimetype?: string;
  buffer?: Buffer;
}

export type UploadKind = 'pdf' | 'text' | 'unsupported';

export const MAX_CV_CHARS = 120000;
export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const TEXT_MIME_HINTS = ['text', 'json', 'xml'];
const TEXT_EXTENSIONS = ['.txt', '.md', '.csv'];

export function uploadKind(file: UploadedCv): UploadKind {
  const name = (file.originalname || '').toLowerCase();
  const mime = (file.mimetype || '').toLowerCase();

  if (mime.includes('pdf') || name.endsWith('.pdf')) return 'pdf';
  if (TEXT_MIME_HINTS.some((hint) => mime.includes(hint)) || TEXT_EXTENSIONS.some((ext) => name.endsWith(ext))) {
    return 'text';
  }
  return 'unsupported';
}

/** Turns typed resume text plus an optional upload into one plain-text resume. */
@Injectable()
export class CvParserService {
  private readonly logger = new Logger(CvParserService.name);

  async parseCv(inputText: string | undefined, file?: UploadedCv): Promise<string> {
    const parts = [(inputText || '').trim()];
    if (file?.buffer) {
      parts.push(await this.readUpload(file, file.buffer));
    }
    return parts
      .filter(Boolean)
      .join('\n')
      .replace(/\r/g, '\n')
      .trim()
      .slice(0, MAX_CV_CHARS);
  }

  private async readUpload(file: UploadedCv, buffer: Buffer): Promise<string> {
    const label = file.originalname || 'upload';

    switch (uploadKind(file)) {
      case 'pdf':
        try {
          return cleanText(await this.readPdf(buffer));
        } catch (error) {
          this.logger.warn(`Could not read PDF "${label}": ${error instanceof Error ? error.message : String(error)}`);
          return '';
        }
      case 'text':
        return cleanText(buffer.toString('utf8'));
      case 'unsupported':
        this.logger.warn(`Ignoring upload "${label}" with unsupported type "${file.mimetype || 'unknown'}"`);
        return '';
    }
  }

  private async readPdf(buffer: Buffer): Promise<string> {
    // pdf-parse must not load with this module: required without a parent it runs its debug harness.
    const { default: pdfParse } = await import('pdf-parse');
    const parsed = await pdfParse(buffer);
    return parsed.text || '';
  }
}

function cleanText(text: string): string {
  return text.replace(/\u0000/g, ' ').trim();
}
