export const VALIDATE_ENTRY_POINT_NAME = "__validate__";
export const EXECUTE_ENTRY_POINT_NAME = "__execute__";
export const VALIDATE_DECLARE_ENTRY_POINT_NAME = "__validate_declare__";

export const ACCOUNT_ENTRY_POINT_NAMES = [
  VALIDATE_ENTRY_POINT_NAME,
  EXECUTE_ENTRY_POINT_NAME,
  VALIDATE_DECLARE_ENTRY_POINT_NAME,
] as const;

export type AccountEntryPointName = (typeof ACCOUNT_ENTRY_POINT_NAMES)[number];

const accountEntryPointNames: ReadonlySet<string> = new Set(ACCOUNT_ENTRY_POINT_NAMES);

export function isAccountEntryPointName(name: string): name is AccountEntryPointName {
  return accountEntryPointNames.has(name);
}

/** Value of the `%lang` directive that enables Starknet constructs. */
export const STARKNET_LANG_DIRECTIVE = "starknet";
