import type { SourceLocation } from "../ast/types.ts";
import type { ResolvedType } from "../types/resolved.ts";

/** Direction of an encoding; selects the buffer the values are written to. */
export const EncodingType = {
  CALLDATA: "calldata",
  RETURN: "return",
} as const;

export type EncodingType = (typeof EncodingType)[keyof typeof EncodingType];

export interface ArgumentInfo {
  name: string;
  cairoType: ResolvedType;
  location: SourceLocation;
}

/** Write one felt to the next slot of the output buffer. */
export interface WriteOp {
  op: "write";
  expr: string;
  location: SourceLocation;
}

/** Assert through the range-check builtin that `expr` is non-negative. */
export interface RangeCheckOp {
  op: "range-check";
  expr: string;
  location: SourceLocation;
}

/** Copy `length * elementSize` felts from the pointer `source`. */
export interface CopyOp {
  op: "copy";
  source: string;
  length: string;
  elementSize: number;
  location: SourceLocation;
}

export type EmittedOp = WriteOp | RangeCheckOp | CopyOp;
