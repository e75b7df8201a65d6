import type {
  Decorator,
  FunctionDecl,
  SourceLocation,
  TypedIdentifier,
  TypeExpr,
} from "../ast/types.ts";
import type { AbiFunctionEntry, AbiMember } from "../abi/types.ts";

export const FILE = "account.cairo";

export function loc(startLine: number, startCol = 1): SourceLocation {
  return { file: FILE, startLine, startCol };
}

export function fn(overrides: Partial<FunctionDecl> = {}): FunctionDecl {
  return {
    name: "foo",
    location: loc(1),
    arguments: { identifiers: [] },
    decorators: [],
    additionalAttributes: [],
    ...overrides,
  };
}

export function decorator(name: string, line: number): Decorator {
  return { name, location: loc(line) };
}

export function arg(name: string, type: TypeExpr | undefined, line: number): TypedIdentifier {
  return { name, type, location: loc(line) };
}

export const felt: TypeExpr = { kind: "felt" };

export function named(name: string, line?: number): TypeExpr {
  return { kind: "named", name, location: line === undefined ? undefined : loc(line) };
}

export function ptr(pointee: TypeExpr): TypeExpr {
  return { kind: "pointer", pointee };
}

export function abiFunction(name: string, inputs: AbiMember[] = []): AbiFunctionEntry {
  return { type: "function", name, inputs, outputs: [] };
}

/** Run `fn` and return what it threw; fails the test when nothing is thrown. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
