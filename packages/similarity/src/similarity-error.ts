/**
 * Raised for anything that goes wrong talking to the similarity service:
 * refused connections, rejected languages, malformed replies, failed downloads.
 */
export class SimilarityServiceError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SimilarityServiceError';
    this.cause = cause;
  }
}
