/**
 * @starkcheck/compiler
 * Starknet declaration checks, account contract conformance, and calldata encoding
 */

// AST
export type {
  SourceLocation,
  TypeExpr,
  FeltTypeExpr,
  NamedTypeExpr,
  PointerTypeExpr,
  TupleTypeExpr,
  TupleTypeExprMember,
  TypedIdentifier,
  IdentifierList,
  Decorator,
  EntryPointType,
  FunctionAttribute,
  FunctionAttributeKind,
  ExternalWrapperAttribute,
  EntryPointAttribute,
  FunctionDecl,
} from "./ast/types.ts";
export { hasDecorator, getFunctionAttr, getType, type DecoratorLookup } from "./ast/helpers.ts";

// ABI
export type {
  AbiMember,
  AbiStructMember,
  AbiEntry,
  AbiEntryType,
  AbiFunctionEntry,
  AbiConstructorEntry,
  AbiL1HandlerEntry,
  AbiEventEntry,
  AbiStructEntry,
  ContractAbi,
} from "./abi/types.ts";
export * from "./abi/constants.ts";
export { AbiEntrySchema, ContractAbiSchema, parseContractAbi } from "./abi/schema.ts";

// Validation
export * from "./validation/index.ts";

// Types
export * from "./types/resolved.ts";
export { createTypeResolver, type TypeResolver, type ResolvingVisitor } from "./types/resolver.ts";

// Encoding
export { EncodingType } from "./encoding/types.ts";
export type { ArgumentInfo, EmittedOp, WriteOp, RangeCheckOp, CopyOp } from "./encoding/types.ts";
export { encodeData, type EncodeDataOptions } from "./encoding/data-encoder.ts";
export { encodeCalldataArguments } from "./encoding/calldata.ts";
export { renderEncoding, renderOp, outputPointer } from "./encoding/render.ts";

// Errors and locations
export * from "./errors.ts";
export { formatLocation, nonOptionalLocation } from "./utils/location.ts";
