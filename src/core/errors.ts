/**
 * Base class for failures that stop a whole document from being processed.
 */
export abstract class OutlineExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The PDF library could not open the document: corrupt, encrypted, empty or
 * not a PDF at all.
 */
export class UnreadableDocumentError extends OutlineExtractionError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Unreadable PDF document: ${reason}`, 'DOCUMENT_UNREADABLE', false, options);
  }
}

/** Thrown when a page is requested before a document has been loaded. */
export class DocumentNotLoadedError extends OutlineExtractionError {
  constructor() {
    super('Document not loaded', 'DOCUMENT_NOT_LOADED', false);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
