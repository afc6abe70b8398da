import pdfParse from 'pdf-parse';
import mammoth from 'mammoth';
import { DocumentRole, ExtractionFailure, UploadedDocument } from '../interfaces/domain/DocumentText';
import { DocumentExtractionError } from './errorHandler';
import { logger } from './logger';

export interface TextExtractor {
  name: string;
  extensions: string[];
  mimeTypes: string[];
  extract(buffer: Buffer): Promise<string>;
}

export const pdfExtractor: TextExtractor = {
  name: 'pdf',
  extensions: ['.pdf'],
  mimeTypes: ['application/pdf'],
  async extract(buffer) {
    const pdfData = await pdfParse(buffer);
    return pdfData.text;
  }
};

export const docxExtractor: TextExtractor = {
  name: 'docx',
  extensions: ['.docx'],
  mimeTypes: ['application/vnd.openxmlformats-officedocument.wordprocessingml.document'],
  async extract(buffer) {
    const result = await mammoth.extractRawText({ buffer });
    return result.value || '';
  }
};

const ENCODED_REPLACEMENT_CHAR = Buffer.from([0xef, 0xbf, 0xbd]);

function decodeDroppingInvalid(bytes: Buffer, ignoreBOM: boolean): string {
  return new TextDecoder('utf-8', { ignoreBOM }).decode(bytes).replace(/\uFFFD/g, '');
}

/**
 * Decodes UTF-8, dropping undecodable bytes. U+FFFD characters that are
 * genuinely encoded in the document are kept.
 */
export function decodeUtf8(buffer: Buffer): string {
  const parts: string[] = [];
  let start = 0;
  let at = buffer.indexOf(ENCODED_REPLACEMENT_CHAR);
  while (at !== -1) {
    parts.push(decodeDroppingInvalid(buffer.subarray(start, at), start > 0));
    start = at + ENCODED_REPLACEMENT_CHAR.length;
    at = buffer.indexOf(ENCODED_REPLACEMENT_CHAR, start);
  }
  parts.push(decodeDroppingInvalid(buffer.subarray(start), start > 0));
  return parts.join('\uFFFD');
}

export const plainTextExtractor: TextExtractor = {
  name: 'txt',
  extensions: ['.txt'],
  mimeTypes: ['text/plain'],
  async extract(buffer) {
    return decodeUtf8(buffer);
  }
};

/** Fallback order when neither the filename nor the MIME type identifies the format. */
export const DEFAULT_EXTRACTORS: TextExtractor[] = [pdfExtractor, docxExtractor, plainTextExtractor];

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function selectExtractors(
  document: Pick<UploadedDocument, 'filename' | 'mimetype'>,
  extractors: TextExtractor[] = DEFAULT_EXTRACTORS
): TextExtractor[] {
  const filename = document.filename.toLowerCase();

  const byExtension = extractors.find(extractor =>
    extractor.extensions.some(extension => filename.endsWith(extension))
  );
  if (byExtension) {
    return [byExtension];
  }

  const mimetype = (document.mimetype || '').toLowerCase();
  const byMimeType = extractors.find(extractor => extractor.mimeTypes.includes(mimetype));
  if (byMimeType) {
    return [byMimeType];
  }

  return extractors;
}

/**
 * Runs the candidate extractors in order and returns the first text produced,
 * with line breaks normalized to `\n`. An empty document yields `''`.
 */
export async function extractDocumentText(
  role: DocumentRole,
  document: UploadedDocument,
  extractors: TextExtractor[] = DEFAULT_EXTRACTORS
): Promise<string> {
  const candidates = selectExtractors(document, extractors);
  const failures: ExtractionFailure[] = [];

  for (const extractor of candidates) {
    try {
      const text = await extractor.extract(document.buffer);
      logger.debug('Extracted document text', {
        document: role,
        filename: document.filename,
        extractor: extractor.name,
        length: text.length
      });
      return text.replace(/\r\n?/g, '\n');
    } catch (error) {
      logger.warn('Text extractor failed', {
        document: role,
        filename: document.filename,
        extractor: extractor.name,
        error: describeError(error)
      });
      failures.push({ extractor: extractor.name, message: describeError(error) });
    }
  }

  throw new DocumentExtractionError(role, failures);
}
