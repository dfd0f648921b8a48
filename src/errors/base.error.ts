/**
 * Base class for all gitmarks errors
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details?: string | undefined;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Message with the underlying cause appended, if any
   */
  public describe(): string {
    return this.details ? `${this.message}: ${this.details}` : this.message;
  }
}

/**
 * Render any thrown value as a cause string
 */
export function causeOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
