/**
 * Configuration Error Class
 *
 * Raised for unreadable, malformed or incomplete batch configuration and for
 * missing credentials. Always fatal: nothing runs after one is thrown.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public source?: string,
    public suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error for CLI output
   */
  override toString(): string {
    let output = this.message;
    if (this.source) {
      output += `\n   Source: ${this.source}`;
    }
    if (this.suggestion) {
      output += `\n   Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
