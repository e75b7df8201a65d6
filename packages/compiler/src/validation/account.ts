import {
  ACCOUNT_ENTRY_POINT_NAMES,
  EXECUTE_ENTRY_POINT_NAME,
  VALIDATE_DECLARE_ENTRY_POINT_NAME,
  VALIDATE_ENTRY_POINT_NAME,
  isAccountEntryPointName,
  type AccountEntryPointName,
} from "../abi/constants.ts";
import type { AbiFunctionEntry, AbiMember, ContractAbi } from "../abi/types.ts";
import {
  DuplicateEntryPointError,
  InvalidDeclareSignatureError,
  MissingAccountEntryPointsError,
  SignatureMismatchError,
  UnexpectedAccountEntryPointsError,
} from "../errors.ts";

/** The only accepted calldata of `__validate_declare__`. */
export const VALIDATE_DECLARE_INPUTS: ReadonlyArray<AbiMember> = [
  { name: "class_hash", type: "felt" },
];

function formatNames(names: ReadonlyArray<string>): string {
  return names.length > 0 ? names.map((name) => `'${name}'`).join(", ") : "none";
}

/** Ordered, field-by-field equality of two member lists. */
export function sameMembers(a: ReadonlyArray<AbiMember>, b: ReadonlyArray<AbiMember>): boolean {
  if (a.length !== b.length) return false;
  return a.every((member, i) => {
    const other = b[i];
    return other !== undefined && member.name === other.name && member.type === other.type;
  });
}

/**
 * For account contracts, verifies that the ABI has all three account entry
 * points with their expected calldata. For any other contract, verifies that
 * it has none of them.
 */
export function verifyAccountContract(abi: ContractAbi, isAccountContract: boolean): void {
  const entryPoints = new Map<AccountEntryPointName, AbiFunctionEntry>();

  for (const entry of abi) {
    if (entry.type !== "function") continue;
    const name = entry.name;
    if (!isAccountEntryPointName(name)) continue;
    if (isAccountContract && entryPoints.has(name)) {
      throw new DuplicateEntryPointError(
        `Account contracts must have exactly one function named '${name}'.`,
        name
      );
    }
    entryPoints.set(name, entry);
  }

  const found = [...entryPoints.keys()];

  if (!isAccountContract) {
    if (found.length > 0) {
      throw new UnexpectedAccountEntryPointsError(
        `Only account contracts may have functions named ${formatNames(found)}. ` +
          "Use the --account-contract flag to compile an account contract.",
        found
      );
    }
    return;
  }

  const validate = entryPoints.get(VALIDATE_ENTRY_POINT_NAME);
  const execute = entryPoints.get(EXECUTE_ENTRY_POINT_NAME);
  const validateDeclare = entryPoints.get(VALIDATE_DECLARE_ENTRY_POINT_NAME);

  if (validate === undefined || execute === undefined || validateDeclare === undefined) {
    throw new MissingAccountEntryPointsError(
      "Account contracts must have external functions named " +
        `${formatNames(ACCOUNT_ENTRY_POINT_NAMES)}, found: ${formatNames(found)}.`,
      found
    );
  }

  if (!sameMembers(execute.inputs, validate.inputs)) {
    throw new SignatureMismatchError(
      "Account contracts must have the exact same calldata for " +
        `'${VALIDATE_ENTRY_POINT_NAME}' and '${EXECUTE_ENTRY_POINT_NAME}' functions.`
    );
  }

  if (!sameMembers(validateDeclare.inputs, VALIDATE_DECLARE_INPUTS)) {
    throw new InvalidDeclareSignatureError(
      `'${VALIDATE_DECLARE_ENTRY_POINT_NAME}' function must have one argument ` +
        "`class_hash: felt`."
    );
  }
}
