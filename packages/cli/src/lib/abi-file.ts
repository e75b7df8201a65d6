import { readFile } from "node:fs/promises";
import { parseContractAbi, type ContractAbi } from "@starkcheck/compiler";
import { BaseError } from "@starkcheck/shared";

export class AbiFileError extends BaseError {
  override name = "AbiFileError";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load a contract ABI from a JSON file. Accepts a bare ABI array or a
 * compiled contract whose `abi` field holds it.
 */
export async function loadAbiFile(filePath: string): Promise<ContractAbi> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (err) {
    throw new AbiFileError(`File not found: ${filePath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new AbiFileError(`Invalid JSON in ${filePath}`, {
      cause: err,
      details: err instanceof Error ? err.message : undefined,
    });
  }

  return parseContractAbi(isRecord(json) && "abi" in json ? json.abi : json);
}
