import path from 'path';
import type { Logger } from '../logger';
import { errorMessage, UnparseableDocumentError, UnsupportedDocumentError } from '../errors';
import type { DocumentFormat, DocumentRole, ParsedDocument, UploadedFile } from '../types';
import { generateDocumentId } from '../utils';
import { pdfToText } from './pdf';
import { cleanText } from './text';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt'] as const;

const MIME_FORMATS: Record<string, DocumentFormat> = {
  'application/pdf': 'pdf',
  'text/plain': 'text',
};

export function detectFormat(file: Pick<UploadedFile, 'name' | 'mimeType'>): DocumentFormat | null {
  const mime = file.mimeType?.split(';')[0].trim().toLowerCase();
  if (mime && MIME_FORMATS[mime]) {
    return MIME_FORMATS[mime];
  }
  const ext = path.extname(file.name).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (ext === '.txt') return 'text';
  return null;
}

/** UTF-8 when the bytes are valid UTF-8, latin-1 otherwise. */
export function decodeText(bytes: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

export class DocumentParser {
  constructor(private readonly logger: Logger) {}

  async parse(file: UploadedFile, role: DocumentRole): Promise<ParsedDocument> {
    const format = detectFormat(file);
    if (!format) {
      this.logger.warn(`Unsupported upload "${file.name}" (${file.mimeType ?? 'no mime type'})`);
      throw new UnsupportedDocumentError(file.name);
    }

    let rawText: string;
    if (format === 'pdf') {
      try {
        rawText = (await pdfToText(file.bytes)).fullText;
      } catch (error) {
        this.logger.error(`PDF parsing failed for "${file.name}": ${errorMessage(error)}`);
        throw new UnparseableDocumentError(file.name, 'PDF text extraction failed', { cause: error });
      }
    } else {
      rawText = decodeText(file.bytes);
    }

    const cleanedText = cleanText(rawText);
    if (!cleanedText) {
      this.logger.warn(`No text could be extracted from "${file.name}"`);
      throw new UnparseableDocumentError(file.name, 'no text could be extracted');
    }

    this.logger.debug(`📄 Parsed "${file.name}" (${format}, ${cleanedText.length} chars)`);

    return {
      id: generateDocumentId(role, file.name, file.bytes),
      role,
      name: file.name,
      format,
      rawText,
      cleanedText,
    };
  }

  /** Pasted job-description text goes through the same cleaning and empty check. */
  fromText(text: string, name: string, role: DocumentRole): ParsedDocument {
    const cleanedText = cleanText(text);
    if (!cleanedText) {
      throw new UnparseableDocumentError(name, 'text is empty after cleaning');
    }
    return {
      id: generateDocumentId(role, name, text),
      role,
      name,
      format: 'text',
      rawText: text,
      cleanedText,
    };
  }
}
