import type { FunctionDecl, SourceLocation } from "../ast/types.ts";
import { STARKNET_LANG_DIRECTIVE } from "../abi/constants.ts";
import {
  DialectMismatchError,
  InvalidSignatureError,
  UnexpectedDecoratorError,
} from "../errors.ts";
import type { AllowedDecorators } from "./decorators.ts";

// Checks on a single function declaration. `subject` names the construct in
// error messages, e.g. "Constructors" or "@storage_var".

export function verifyNoImplicitArguments(decl: FunctionDecl, subject: string): void {
  const implicitArguments = decl.implicitArguments;
  if (implicitArguments !== undefined && implicitArguments.identifiers.length !== 0) {
    throw new InvalidSignatureError(
      `${subject} must have no implicit arguments.`,
      implicitArguments.location
    );
  }
}

export function verifyDecorators(
  decl: FunctionDecl,
  allowed: AllowedDecorators,
  subject: string
): void {
  for (const decorator of decl.decorators) {
    if (!allowed.includes(decorator.name)) {
      throw new UnexpectedDecoratorError(
        `Unexpected decorator for ${subject}.`,
        decorator.name,
        decorator.location
      );
    }
  }
}

/** Fails unless the file declared `%lang starknet`. */
export function verifyStarknetLang(
  fileLang: string | undefined,
  location: SourceLocation | undefined,
  subject: string
): void {
  if (fileLang !== STARKNET_LANG_DIRECTIVE) {
    throw new DialectMismatchError(
      `${subject} can only be used in source files that contain the ` +
        `"%lang ${STARKNET_LANG_DIRECTIVE}" directive.`,
      location
    );
  }
}

/** Accepts a missing return annotation or `()`, nothing else. */
export function verifyNoReturnValues(decl: FunctionDecl, subject: string): void {
  const returns = decl.returns;
  if (returns === undefined) return;

  if (returns.kind !== "tuple" || returns.members.length > 0) {
    throw new InvalidSignatureError(`${subject} must have no return values.`, returns.location);
  }
}
