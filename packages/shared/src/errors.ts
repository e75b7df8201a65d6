/**
 * Base error class for all starkcheck errors
 */
export class BaseError extends Error {
  override name = "StarkcheckError";
  shortMessage: string;
  details?: string;

  constructor(shortMessage: string, options?: { cause?: unknown; details?: string }) {
    const message = [
      shortMessage,
      options?.details ? `\n${options.details}` : "",
    ].join("");

    super(message, { cause: options?.cause });
    this.shortMessage = shortMessage;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      shortMessage: this.shortMessage,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}
