// Decorators each kind of Starknet declaration may carry

export const CONSTRUCTOR_DECORATORS = ["constructor"] as const;
export const EXTERNAL_DECORATORS = ["external", "view", "raw_input", "raw_output"] as const;
export const L1_HANDLER_DECORATORS = ["l1_handler"] as const;
export const EVENT_DECORATORS = ["event"] as const;
export const STORAGE_VAR_DECORATORS = ["storage_var"] as const;
export const CONTRACT_INTERFACE_DECORATORS = ["contract_interface"] as const;

export type AllowedDecorators = ReadonlyArray<string>;
