import { EncodingType, type EmittedOp } from "./types.ts";

const OUTPUT_POINTERS: Record<EncodingType, string> = {
  [EncodingType.CALLDATA]: "__calldata_ptr",
  [EncodingType.RETURN]: "__return_value_ptr",
};

/** Pointer variable that must be in scope before the rendered code runs. */
export function outputPointer(encodingType: EncodingType): string {
  return OUTPUT_POINTERS[encodingType];
}

export function renderOp(op: EmittedOp, pointer: string): string[] {
  switch (op.op) {
    case "write":
      return [`assert [${pointer}] = ${op.expr}`, `let ${pointer} = ${pointer} + 1`];
    case "range-check":
      return [
        `assert [range_check_ptr] = ${op.expr}`,
        "let range_check_ptr = range_check_ptr + 1",
      ];
    case "copy": {
      const size = op.elementSize === 1 ? op.length : `${op.length} * ${op.elementSize}`;
      return [
        `memcpy(dst=${pointer}, src=${op.source}, len=${size})`,
        `let ${pointer} = ${pointer} + ${size}`,
      ];
    }
  }
}

/** Cairo source lines for the operations, one statement per line. */
export function renderEncoding(ops: ReadonlyArray<EmittedOp>, encodingType: EncodingType): string[] {
  const pointer = outputPointer(encodingType);
  return ops.flatMap((op) => renderOp(op, pointer));
}
