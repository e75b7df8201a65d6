export {
  verifyNoImplicitArguments,
  verifyDecorators,
  verifyStarknetLang,
  verifyNoReturnValues,
} from "./shape.ts";
export { verifyAccountContract, sameMembers, VALIDATE_DECLARE_INPUTS } from "./account.ts";
export * from "./decorators.ts";
