import type { TypeExpr } from "../ast/types.ts";
import { TypeResolutionError } from "../errors.ts";
import { FELT, pointerTo, structRef, type IdentifierTable, type ResolvedType } from "./resolved.ts";

export interface TypeResolver {
  resolveType(type: TypeExpr): ResolvedType;
}

/** What the encoder needs from the surrounding identifier-aware visitor. */
export interface ResolvingVisitor extends TypeResolver {
  identifiers: IdentifierTable;
}

/**
 * Resolver backed by an identifier table: named types must be structs
 * defined in the table.
 */
export function createTypeResolver(identifiers: IdentifierTable): ResolvingVisitor {
  const resolveType = (type: TypeExpr): ResolvedType => {
    switch (type.kind) {
      case "felt":
        return FELT;
      case "pointer":
        return pointerTo(resolveType(type.pointee));
      case "tuple":
        return {
          kind: "tuple",
          members: type.members.map((member) => ({
            name: member.name,
            type: resolveType(member.type),
          })),
        };
      case "named":
        if (identifiers.getStruct(type.name) === undefined) {
          throw new TypeResolutionError(`Unknown type '${type.name}'.`, type.location);
        }
        return structRef(type.name);
    }
  };

  return { resolveType, identifiers };
}
