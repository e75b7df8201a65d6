import type { SourceLocation } from "../ast/types.ts";
import { assertPrecondition } from "./precondition.ts";

export function formatLocation(location: SourceLocation): string {
  const position = `${location.startLine}:${location.startCol}`;
  return location.file ? `${location.file}:${position}` : position;
}

/**
 * Unwraps a location the AST producer guarantees to be present.
 * A missing one is a bug upstream, not a user error.
 */
export function nonOptionalLocation(location: SourceLocation | undefined): SourceLocation {
  assertPrecondition(location !== undefined, "Expected a source location.");
  return location;
}
