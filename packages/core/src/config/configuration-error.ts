/**
 * Configuration Error Class
 *
 * Raised when environment-provided settings fail validation.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public variable?: string,
    public suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error for terminal output
   */
  override toString(): string {
    let output = this.message;
    if (this.variable) {
      output += `\n   Variable: ${this.variable}`;
    }
    if (this.suggestion) {
      output += `\n   Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
