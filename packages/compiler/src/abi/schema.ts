import { z } from "zod";
import { AbiFormatError } from "../errors.ts";
import type { ContractAbi } from "./types.ts";

const AbiMemberSchema = z.object({
  name: z.string(),
  type: z.string().min(1),
});

const AbiStructMemberSchema = AbiMemberSchema.extend({
  offset: z.number().int().nonnegative(),
});

const callableEntry = {
  name: z.string().min(1),
  inputs: z.array(AbiMemberSchema),
  outputs: z.array(AbiMemberSchema).default([]),
};

export const AbiEntrySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("function"),
    ...callableEntry,
    stateMutability: z.literal("view").optional(),
  }),
  z.object({ type: z.literal("constructor"), ...callableEntry }),
  z.object({ type: z.literal("l1_handler"), ...callableEntry }),
  z.object({
    type: z.literal("event"),
    name: z.string().min(1),
    keys: z.array(AbiMemberSchema),
    data: z.array(AbiMemberSchema),
  }),
  z.object({
    type: z.literal("struct"),
    name: z.string().min(1),
    size: z.number().int().nonnegative(),
    members: z.array(AbiStructMemberSchema),
  }),
]);

export const ContractAbiSchema = z.array(AbiEntrySchema);

/**
 * Validate untrusted JSON as a contract ABI.
 * Throws `AbiFormatError` listing every schema issue.
 */
export function parseContractAbi(json: unknown): ContractAbi {
  const result = ContractAbiSchema.safeParse(json);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new AbiFormatError("Invalid contract ABI.", details);
  }
  return result.data;
}
