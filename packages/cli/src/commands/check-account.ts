import type { Command } from "commander";
import { verifyAccountContract } from "@starkcheck/compiler";
import { BaseError, logger } from "@starkcheck/shared";
import { loadAbiFile } from "../lib/abi-file.ts";
import { dim, error, printJson, success } from "../lib/output.ts";

export interface CheckAccountOptions {
  accountContract?: boolean;
  json?: boolean;
}

export function registerCheckAccountCommand(program: Command): void {
  program
    .command("check-account <abi>")
    .description("Check a contract ABI against the account contract entry points")
    .option("-a, --account-contract", "Require the account contract entry points")
    .option("--json", "Output as JSON")
    .action(async (filePath: string, options: CheckAccountOptions) => {
      process.exitCode = await runCheckAccount(filePath, options);
    });
}

/**
 * Run the check and report the outcome. Returns the process exit code.
 */
export async function runCheckAccount(filePath: string, options: CheckAccountOptions): Promise<number> {
  const accountContract = options.accountContract ?? false;

  try {
    const abi = await loadAbiFile(filePath);
    logger.debug("Loaded contract ABI", { file: filePath, entries: abi.length, accountContract });
    verifyAccountContract(abi, accountContract);
  } catch (err) {
    if (!(err instanceof BaseError)) throw err;

    if (options.json) {
      printJson({ ok: false, file: filePath, error: err.toJSON() });
    } else {
      error(err.shortMessage);
      if (err.details) console.error(dim(err.details));
    }
    return 1;
  }

  if (options.json) {
    printJson({ ok: true, file: filePath, accountContract });
  } else {
    success(
      accountContract
        ? `${filePath}: account contract conforms`
        : `${filePath}: no account entry points`
    );
  }
  return 0;
}
