export { registerCheckAccountCommand, runCheckAccount } from "./check-account.ts";
