export type AnalysisErrorCode =
  | 'LEXICON_UNAVAILABLE'
  | 'INPUT_UNAVAILABLE'
  | 'EXTRACTION_FAILED'
  | 'UNSUPPORTED_DOCUMENT'
  | 'DOCUMENT_TOO_LARGE'
  | 'SINK_FAILED'
  | 'INVALID_INPUT';

export class AnalysisError extends Error {
  public readonly code: AnalysisErrorCode;
  public readonly document?: string;

  constructor(code: AnalysisErrorCode, message: string, document?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalysisError';
    this.code = code;
    this.document = document;
  }
}

/**
 * Flatten any thrown value into the { code, message } shape tools and batch reports carry
 */
export function describeError(err: unknown, fallbackCode: string): { code: string; message: string } {
  if (err instanceof AnalysisError) {
    return { code: err.code, message: err.message };
  }
  return {
    code: fallbackCode,
    message: err instanceof Error ? err.message : 'Unknown error',
  };
}
