export { CreditLimitChecker, type CreditCheck } from "./credit-limit-checker";
