import { BuiltinRequiredError, UnsupportedArgumentError } from "../errors.ts";
import {
  containsPointer,
  feltSize,
  formatResolvedType,
  getStructDefinition,
  type IdentifierTable,
  type ResolvedPointer,
  type ResolvedType,
} from "../types/resolved.ts";
import { EncodingType, type ArgumentInfo, type EmittedOp } from "./types.ts";

const DIRECTION_LABELS: Record<EncodingType, string> = {
  [EncodingType.CALLDATA]: "calldata",
  [EncodingType.RETURN]: "return values",
};

export interface EncodeDataOptions {
  arguments: ReadonlyArray<ArgumentInfo>;
  encodingType: EncodingType;
  hasRangeCheckBuiltin: boolean;
  identifiers: IdentifierTable;
}

/**
 * Flattens the arguments, in order, into operations writing consecutive felts
 * to the output buffer of the given direction.
 *
 * An array is a pointer argument `x: T*` directly preceded by `x_len: felt`.
 * The length is written by its own argument; the array adds a range check on
 * the length and a copy of `x_len * T.SIZE` felts.
 */
export function encodeData(options: EncodeDataOptions): EmittedOp[] {
  const { arguments: args, identifiers } = options;
  const direction = DIRECTION_LABELS[options.encodingType];
  const ops: EmittedOp[] = [];

  args.forEach((argument, index) => {
    const type = argument.cairoType;
    if (type.kind === "pointer") {
      ops.push(...encodeArray(argument, type, args[index - 1], direction, options));
    } else {
      ops.push(...flatten(argument.name, type, argument, direction, identifiers));
    }
  });

  return ops;
}

function flatten(
  expr: string,
  type: ResolvedType,
  argument: ArgumentInfo,
  direction: string,
  identifiers: IdentifierTable
): EmittedOp[] {
  switch (type.kind) {
    case "felt":
      return [{ op: "write", expr, location: argument.location }];
    case "tuple":
      return type.members.flatMap((member, i) =>
        flatten(`${expr}[${i}]`, member.type, argument, direction, identifiers)
      );
    case "struct":
      return getStructDefinition(identifiers, type.scope).members.flatMap((member) =>
        flatten(`${expr}.${member.name}`, member.type, argument, direction, identifiers)
      );
    case "pointer":
      throw new UnsupportedArgumentError(
        `Argument '${argument.name}' has a pointer member '${expr}', ` +
          `which cannot be encoded in ${direction}.`,
        argument.location
      );
  }
}

function encodeArray(
  argument: ArgumentInfo,
  type: ResolvedPointer,
  previous: ArgumentInfo | undefined,
  direction: string,
  options: EncodeDataOptions
): EmittedOp[] {
  const lengthName = `${argument.name}_len`;

  if (previous === undefined || previous.name !== lengthName || previous.cairoType.kind !== "felt") {
    throw new UnsupportedArgumentError(
      `Array argument '${argument.name}' must be preceded by a length argument ` +
        `named '${lengthName}' of type felt.`,
      argument.location
    );
  }

  if (containsPointer(type.pointee, options.identifiers)) {
    throw new UnsupportedArgumentError(
      `Array argument '${argument.name}' of type '${formatResolvedType(type)}' ` +
        `has elements containing pointers, which cannot be encoded in ${direction}.`,
      argument.location
    );
  }

  if (!options.hasRangeCheckBuiltin) {
    throw new BuiltinRequiredError(
      `The range_check builtin is required to encode array argument '${argument.name}' ` +
        `in ${direction}.`,
      argument.location
    );
  }

  return [
    { op: "range-check", expr: lengthName, location: argument.location },
    {
      op: "copy",
      source: argument.name,
      length: lengthName,
      elementSize: feltSize(type.pointee, options.identifiers),
      location: argument.location,
    },
  ];
}
