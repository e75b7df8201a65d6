import type {
  FunctionAttribute,
  FunctionAttributeKind,
  FunctionDecl,
  SourceLocation,
  TypedIdentifier,
  TypeExpr,
} from "./types.ts";

export type DecoratorLookup =
  | { found: true; location?: SourceLocation }
  | { found: false };

/**
 * Returns whether the function carries the given decorator, and where.
 */
export function hasDecorator(decl: FunctionDecl, decoratorName: string): DecoratorLookup {
  for (const decorator of decl.decorators) {
    if (decorator.name === decoratorName) {
      return { found: true, location: decorator.location };
    }
  }
  return { found: false };
}

/**
 * Returns the function's attribute of the given kind, if any.
 */
export function getFunctionAttr<K extends FunctionAttributeKind>(
  decl: FunctionDecl,
  kind: K
): Extract<FunctionAttribute, { kind: K }> | undefined {
  for (const attr of decl.additionalAttributes) {
    if (isAttributeOfKind(attr, kind)) return attr;
  }
  return undefined;
}

function isAttributeOfKind<K extends FunctionAttributeKind>(
  attr: FunctionAttribute,
  kind: K
): attr is Extract<FunctionAttribute, { kind: K }> {
  return attr.kind === kind;
}

/** The declared type of an identifier; unannotated identifiers are felts. */
export function getType(identifier: TypedIdentifier): TypeExpr {
  return identifier.type ?? { kind: "felt", location: identifier.location };
}
