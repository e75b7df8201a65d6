import { TypeResolutionError } from "../errors.ts";

export interface ResolvedFelt {
  kind: "felt";
}

export interface ResolvedPointer {
  kind: "pointer";
  pointee: ResolvedType;
}

export interface ResolvedTupleMember {
  name?: string;
  type: ResolvedType;
}

export interface ResolvedTuple {
  kind: "tuple";
  members: ReadonlyArray<ResolvedTupleMember>;
}

/** A reference to a struct; its members live in the identifier table. */
export interface ResolvedStruct {
  kind: "struct";
  scope: string;
}

export type ResolvedType = ResolvedFelt | ResolvedPointer | ResolvedTuple | ResolvedStruct;

export interface StructMember {
  name: string;
  type: ResolvedType;
}

export interface StructDefinition {
  scope: string;
  /** In offset order. */
  members: ReadonlyArray<StructMember>;
}

export interface IdentifierTable {
  getStruct(scope: string): StructDefinition | undefined;
}

/**
 * Identifier table over a fixed set of struct definitions.
 */
export class StructTable implements IdentifierTable {
  private readonly structs: ReadonlyMap<string, StructDefinition>;

  constructor(definitions: Iterable<StructDefinition> = []) {
    const structs = new Map<string, StructDefinition>();
    for (const definition of definitions) {
      structs.set(definition.scope, definition);
    }
    this.structs = structs;
  }

  getStruct(scope: string): StructDefinition | undefined {
    return this.structs.get(scope);
  }
}

export const FELT: ResolvedFelt = { kind: "felt" };

export function pointerTo(pointee: ResolvedType): ResolvedPointer {
  return { kind: "pointer", pointee };
}

export function structRef(scope: string): ResolvedStruct {
  return { kind: "struct", scope };
}

export function getStructDefinition(
  identifiers: IdentifierTable,
  scope: string
): StructDefinition {
  const definition = identifiers.getStruct(scope);
  if (definition === undefined) {
    throw new TypeResolutionError(`Unknown struct '${scope}'.`);
  }
  return definition;
}

/** Number of felts a value of this type occupies in memory. */
export function feltSize(type: ResolvedType, identifiers: IdentifierTable): number {
  switch (type.kind) {
    case "felt":
    case "pointer":
      return 1;
    case "tuple":
      return type.members.reduce((size, member) => size + feltSize(member.type, identifiers), 0);
    case "struct":
      return getStructDefinition(identifiers, type.scope).members.reduce(
        (size, member) => size + feltSize(member.type, identifiers),
        0
      );
  }
}

/** Whether a pointer occurs anywhere inside the type (the type itself included). */
export function containsPointer(type: ResolvedType, identifiers: IdentifierTable): boolean {
  switch (type.kind) {
    case "felt":
      return false;
    case "pointer":
      return true;
    case "tuple":
      return type.members.some((member) => containsPointer(member.type, identifiers));
    case "struct":
      return getStructDefinition(identifiers, type.scope).members.some((member) =>
        containsPointer(member.type, identifiers)
      );
  }
}

export function formatResolvedType(type: ResolvedType): string {
  switch (type.kind) {
    case "felt":
      return "felt";
    case "pointer":
      return `${formatResolvedType(type.pointee)}*`;
    case "tuple":
      return `(${type.members
        .map((m) => (m.name ? `${m.name}: ${formatResolvedType(m.type)}` : formatResolvedType(m.type)))
        .join(", ")})`;
    case "struct":
      return type.scope;
  }
}
