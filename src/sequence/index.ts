export * from "./types.js";
export { extractSteps, isStepHeader, stepsEqual, stepTitle } from "./steps.js";
export { classifySteps, locateFailingStep } from "./classify.js";
export {
  DONE_MARKER,
  FAIL_MARKER,
  formatSequence,
  indent,
  longestLineLength,
  reportPartition,
  summarizeSequence,
} from "./report.js";
export { findSequenceSection, listSequenceNames, readDocument, readSequenceSteps } from "./documents.js";
export { findResult, isTestStatus, parseResultLine, parseResultLog, parseStatus } from "./results.js";
