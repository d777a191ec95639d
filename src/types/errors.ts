/**
 * Structured Error System for controlled vocabularies
 *
 * Provides machine-readable errors with codes and suggestions.
 */

/**
 * Error codes for vocabulary operations
 */
export type VocabularyErrorCode =
  | 'UNKNOWN_VOCABULARY'      // Registration named a vocabulary missing from the catalog
  | 'UNPARSEABLE_IDENTIFIER'  // Candidate could not be read as an IRI (never thrown)
  | 'AMBIGUOUS_IDENTITY'      // Blank node offered as a record identity (never thrown)
  | 'STORE_UNAVAILABLE'       // Backing store query failed
  | 'SOURCE_UNAVAILABLE'      // Vocabulary source document could not be loaded
  | 'INVALID_CONFIG';         // Configuration or catalog failed validation

/**
 * Structured error with code, message and suggestion
 */
export interface VocabularyError {
  code: VocabularyErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending name, identifier or query
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping VocabularyError for throw/catch patterns
 */
export class VocabularyException extends Error {
  public readonly error: VocabularyError;

  constructor(error: VocabularyError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'VocabularyException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VocabularyException);
    }
  }

  get code(): VocabularyErrorCode {
    return this.error.code;
  }

  toJSON(): VocabularyError {
    return this.error;
  }
}

/**
 * Create an unknown vocabulary error
 */
export function createUnknownVocabularyError(
  name: string,
  known: string[]
): VocabularyException {
  return new VocabularyException({
    code: 'UNKNOWN_VOCABULARY',
    message: `Vocabulary undefined: ${name.toUpperCase()}`,
    suggestion: known.length > 0
      ? `Use one of: ${known.join(', ')}`
      : 'Add the vocabulary to the catalog before registering it',
    context: name,
    details: { name },
  });
}

/**
 * Create a store unavailable error
 */
export function createStoreUnavailableError(
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown
): VocabularyException {
  return new VocabularyException({
    code: 'STORE_UNAVAILABLE',
    message: `Triple store unavailable: ${message}`,
    details,
  }, { cause });
}

/**
 * Create a source unavailable error
 */
export function createSourceUnavailableError(
  vocabulary: string,
  source: string,
  message: string,
  cause?: unknown
): VocabularyException {
  return new VocabularyException({
    code: 'SOURCE_UNAVAILABLE',
    message: `Could not load ${vocabulary} from ${source}: ${message}`,
    suggestion: 'Check that the source document is reachable and serialized as Turtle or N-Triples',
    context: source,
    details: { vocabulary, source },
  }, { cause });
}

/**
 * Create an invalid configuration error
 */
export function createInvalidConfigError(
  message: string,
  details?: Record<string, unknown>
): VocabularyException {
  return new VocabularyException({
    code: 'INVALID_CONFIG',
    message: `Invalid configuration: ${message}`,
    details,
  });
}

/**
 * Serialize a VocabularyError for JSON output
 */
export function serializeVocabularyError(error: VocabularyError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Human-readable description of a thrown value.
 */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
