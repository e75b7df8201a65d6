/**
 * @starkcheck/cli
 * Command-line checks for Starknet account contract ABIs
 */

export { registerCheckAccountCommand, runCheckAccount } from "./commands/index.ts";
export type { CheckAccountOptions } from "./commands/check-account.ts";
export { loadAbiFile, AbiFileError } from "./lib/abi-file.ts";
