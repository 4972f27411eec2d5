export type ScreeningErrorKind = 'unparseable' | 'unsupported' | 'embedding' | 'storage' | 'llm' | 'dimension';

export abstract class ScreeningError extends Error {
  abstract readonly kind: ScreeningErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Extraction produced no text (or the extractor itself failed). */
export class UnparseableDocumentError extends ScreeningError {
  readonly kind = 'unparseable';

  constructor(readonly documentName: string, reason?: string, options?: { cause?: unknown }) {
    super(`Unparseable document "${documentName}"${reason ? `: ${reason}` : ''}`, options);
  }
}

export class UnsupportedDocumentError extends ScreeningError {
  readonly kind = 'unsupported';

  constructor(readonly documentName: string) {
    super(`Unsupported file type for "${documentName}" (expected .pdf or .txt)`);
  }
}

export class EmbeddingError extends ScreeningError {
  readonly kind = 'embedding';
}

/** Writing or reading back the vector store failed. */
export class StorageError extends ScreeningError {
  readonly kind = 'storage';
}

export class LlmError extends ScreeningError {
  readonly kind = 'llm';
}

export class VectorDimensionError extends ScreeningError {
  readonly kind = 'dimension';

  constructor(readonly expected: number, readonly actual: number) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The request itself is incomplete (no job description, no resumes). */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}
