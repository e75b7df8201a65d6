import { BaseError } from "@starkcheck/shared";
import type { SourceLocation } from "./ast/types.ts";
import { formatLocation } from "./utils/location.ts";

export type PreprocessorErrorCode =
  | "INVALID_SIGNATURE"
  | "UNEXPECTED_DECORATOR"
  | "DIALECT_MISMATCH"
  | "MISSING_ACCOUNT_ENTRY_POINTS"
  | "SIGNATURE_MISMATCH"
  | "INVALID_DECLARE_SIGNATURE"
  | "UNEXPECTED_ACCOUNT_ENTRY_POINTS"
  | "DUPLICATE_ENTRY_POINT"
  | "TYPE_RESOLUTION"
  | "UNSUPPORTED_ARGUMENT"
  | "BUILTIN_REQUIRED"
  | "ABI_FORMAT";

/**
 * A user-facing problem with the compiled source, optionally tied to the
 * location that caused it.
 */
export class PreprocessorError extends BaseError {
  override name = "PreprocessorError";
  readonly code: PreprocessorErrorCode;
  readonly location?: SourceLocation;

  constructor(
    code: PreprocessorErrorCode,
    message: string,
    options?: { location?: SourceLocation; details?: string; cause?: unknown }
  ) {
    const prefix = options?.location ? `${formatLocation(options.location)}: ` : "";
    super(`${prefix}${message}`, { details: options?.details, cause: options?.cause });
    this.code = code;
    this.location = options?.location;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      code: this.code,
      location: this.location,
    };
  }
}

export class InvalidSignatureError extends PreprocessorError {
  override name = "InvalidSignatureError";
  constructor(message: string, location?: SourceLocation) {
    super("INVALID_SIGNATURE", message, { location });
  }
}

export class UnexpectedDecoratorError extends PreprocessorError {
  override name = "UnexpectedDecoratorError";
  constructor(
    message: string,
    public readonly decorator: string,
    location?: SourceLocation
  ) {
    super("UNEXPECTED_DECORATOR", message, { location });
  }
}

export class DialectMismatchError extends PreprocessorError {
  override name = "DialectMismatchError";
  constructor(message: string, location?: SourceLocation) {
    super("DIALECT_MISMATCH", message, { location });
  }
}

// Account contract conformance

export class MissingAccountEntryPointsError extends PreprocessorError {
  override name = "MissingAccountEntryPointsError";
  constructor(
    message: string,
    public readonly found: ReadonlyArray<string>
  ) {
    super("MISSING_ACCOUNT_ENTRY_POINTS", message);
  }
}

export class SignatureMismatchError extends PreprocessorError {
  override name = "SignatureMismatchError";
  constructor(message: string) {
    super("SIGNATURE_MISMATCH", message);
  }
}

export class InvalidDeclareSignatureError extends PreprocessorError {
  override name = "InvalidDeclareSignatureError";
  constructor(message: string) {
    super("INVALID_DECLARE_SIGNATURE", message);
  }
}

export class UnexpectedAccountEntryPointsError extends PreprocessorError {
  override name = "UnexpectedAccountEntryPointsError";
  constructor(
    message: string,
    public readonly found: ReadonlyArray<string>
  ) {
    super("UNEXPECTED_ACCOUNT_ENTRY_POINTS", message);
  }
}

export class DuplicateEntryPointError extends PreprocessorError {
  override name = "DuplicateEntryPointError";
  constructor(
    message: string,
    public readonly entryPoint: string
  ) {
    super("DUPLICATE_ENTRY_POINT", message);
  }
}

// Types and encoding

export class TypeResolutionError extends PreprocessorError {
  override name = "TypeResolutionError";
  constructor(message: string, location?: SourceLocation) {
    super("TYPE_RESOLUTION", message, { location });
  }
}

export class UnsupportedArgumentError extends PreprocessorError {
  override name = "UnsupportedArgumentError";
  constructor(message: string, location?: SourceLocation) {
    super("UNSUPPORTED_ARGUMENT", message, { location });
  }
}

export class BuiltinRequiredError extends PreprocessorError {
  override name = "BuiltinRequiredError";
  constructor(message: string, location?: SourceLocation) {
    super("BUILTIN_REQUIRED", message, { location });
  }
}

export class AbiFormatError extends PreprocessorError {
  override name = "AbiFormatError";
  constructor(message: string, details?: string) {
    super("ABI_FORMAT", message, { details });
  }
}

export { PreconditionViolation, assertPrecondition } from "./utils/precondition.ts";
