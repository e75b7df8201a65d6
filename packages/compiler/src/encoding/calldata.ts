import { getType } from "../ast/helpers.ts";
import type { IdentifierList } from "../ast/types.ts";
import type { ResolvingVisitor } from "../types/resolver.ts";
import { nonOptionalLocation } from "../utils/location.ts";
import { encodeData } from "./data-encoder.ts";
import { EncodingType, type ArgumentInfo, type EmittedOp } from "./types.ts";

/**
 * Operations that flatten the given arguments to a sequence of felts under
 * `__calldata_ptr`, which must be defined before they run.
 */
export function encodeCalldataArguments(
  args: IdentifierList,
  visitor: ResolvingVisitor
): EmittedOp[] {
  const argumentInfos: ArgumentInfo[] = args.identifiers.map((identifier) => ({
    name: identifier.name,
    cairoType: visitor.resolveType(getType(identifier)),
    location: nonOptionalLocation(identifier.location),
  }));

  return encodeData({
    arguments: argumentInfos,
    encodingType: EncodingType.CALLDATA,
    hasRangeCheckBuiltin: true,
    identifiers: visitor.identifiers,
  });
}
