// Cairo 0 contract ABI, as emitted next to the compiled program

/** A named, typed slot: a function argument, an output, an event field. */
export interface AbiMember {
  name: string;
  type: string;
}

export interface AbiStructMember extends AbiMember {
  offset: number;
}

export interface AbiFunctionEntry {
  type: "function";
  name: string;
  inputs: ReadonlyArray<AbiMember>;
  outputs: ReadonlyArray<AbiMember>;
  stateMutability?: "view";
}

export interface AbiConstructorEntry {
  type: "constructor";
  name: string;
  inputs: ReadonlyArray<AbiMember>;
  outputs: ReadonlyArray<AbiMember>;
}

export interface AbiL1HandlerEntry {
  type: "l1_handler";
  name: string;
  inputs: ReadonlyArray<AbiMember>;
  outputs: ReadonlyArray<AbiMember>;
}

export interface AbiEventEntry {
  type: "event";
  name: string;
  keys: ReadonlyArray<AbiMember>;
  data: ReadonlyArray<AbiMember>;
}

export interface AbiStructEntry {
  type: "struct";
  name: string;
  size: number;
  members: ReadonlyArray<AbiStructMember>;
}

export type AbiEntry =
  | AbiFunctionEntry
  | AbiConstructorEntry
  | AbiL1HandlerEntry
  | AbiEventEntry
  | AbiStructEntry;

export type AbiEntryType = AbiEntry["type"];

export type ContractAbi = ReadonlyArray<AbiEntry>;
