import { describe, it, expect } from "vitest";
import { createTypeResolver } from "../resolver.ts";
import {
  FELT,
  StructTable,
  containsPointer,
  feltSize,
  formatResolvedType,
  pointerTo,
  structRef,
} from "../resolved.ts";
import { TypeResolutionError } from "../../errors.ts";
import { felt, loc, named, ptr } from "../../test-utils/fixtures.ts";

const identifiers = new StructTable([
  {
    scope: "Uint256",
    members: [
      { name: "low", type: FELT },
      { name: "high", type: FELT },
    ],
  },
  {
    scope: "Transfer",
    members: [
      { name: "to", type: FELT },
      { name: "amount", type: structRef("Uint256") },
      { name: "memo", type: pointerTo(FELT) },
    ],
  },
]);

describe("createTypeResolver", () => {
  const { resolveType } = createTypeResolver(identifiers);

  it("resolves felts and pointers", () => {
    expect(resolveType(felt)).toEqual(FELT);
    expect(resolveType(ptr(ptr(felt)))).toEqual(pointerTo(pointerTo(FELT)));
  });

  it("resolves named types to structs from the table", () => {
    expect(resolveType(named("Uint256"))).toEqual(structRef("Uint256"));
    expect(resolveType(ptr(named("Uint256")))).toEqual(pointerTo(structRef("Uint256")));
  });

  it("resolves tuple members in order", () => {
    expect(
      resolveType({ kind: "tuple", members: [{ name: "a", type: felt }, { type: named("Uint256") }] })
    ).toEqual({
      kind: "tuple",
      members: [
        { name: "a", type: FELT },
        { name: undefined, type: structRef("Uint256") },
      ],
    });
  });

  it("rejects unknown names at the type location", () => {
    expect(() => resolveType(ptr(named("Uint512", 9)))).toThrow(
      new TypeResolutionError("Unknown type 'Uint512'.", loc(9))
    );
  });

  it("exposes the identifier table", () => {
    expect(createTypeResolver(identifiers).identifiers).toBe(identifiers);
  });
});

describe("feltSize", () => {
  it("sums member sizes", () => {
    expect(feltSize(FELT, identifiers)).toBe(1);
    expect(feltSize(pointerTo(structRef("Uint256")), identifiers)).toBe(1);
    expect(feltSize(structRef("Uint256"), identifiers)).toBe(2);
    expect(feltSize(structRef("Transfer"), identifiers)).toBe(4);
    expect(
      feltSize({ kind: "tuple", members: [{ type: FELT }, { type: structRef("Uint256") }] }, identifiers)
    ).toBe(3);
  });

  it("fails on unknown structs", () => {
    expect(() => feltSize(structRef("Nope"), identifiers)).toThrow(TypeResolutionError);
  });
});

describe("containsPointer", () => {
  it("looks through structs and tuples", () => {
    expect(containsPointer(structRef("Uint256"), identifiers)).toBe(false);
    expect(containsPointer(structRef("Transfer"), identifiers)).toBe(true);
    expect(containsPointer({ kind: "tuple", members: [{ type: pointerTo(FELT) }] }, identifiers)).toBe(
      true
    );
  });
});

describe("formatResolvedType", () => {
  it("renders Cairo type syntax", () => {
    expect(formatResolvedType(pointerTo(structRef("Uint256")))).toBe("Uint256*");
    expect(
      formatResolvedType({ kind: "tuple", members: [{ name: "a", type: FELT }, { type: pointerTo(FELT) }] })
    ).toBe("(a: felt, felt*)");
  });
});
