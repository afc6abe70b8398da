export type DocumentRole = 'resume' | 'job_description';

export interface UploadedDocument {
  buffer: Buffer;
  filename: string;
  mimetype?: string;
}

export interface ExtractionFailure {
  extractor: string;
  message: string;
}
