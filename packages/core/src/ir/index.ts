export {
  hasText,
  truncateText,
  bestSelector,
  resolveLocator,
  describeElement,
} from "./elements.js";
export {
  OPERATOR_SYMBOLS,
  describeOperand,
  describeCondition,
  describeLoop,
  describeCapture,
  describeEvent,
} from "./describe.js";
export {
  validationErrors,
  isValid,
  validateLoopConfig,
  validateCaptureConfig,
  validateCondition,
  IDENTIFIER_PATTERN,
} from "./validate.js";
export { evaluateAssertion, applyAssertionResult } from "./assertion.js";
export type { ActualValue, AssertionOutcome } from "./assertion.js";
export { walkEvents, countEvents, childListsOf, findEvent } from "./tree.js";
