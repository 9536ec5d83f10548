/**
 * One numbered action in a sequence. Element 0 is the header line
 * (`1. Do something`); any further elements are the indented sub-content
 * that followed it in the markdown, kept verbatim.
 */
export type Step = readonly string[];

export type TestStatus = "pass" | "fail" | "skip" | "abort";

export const TEST_STATUSES: readonly TestStatus[] = ["pass", "fail", "skip", "abort"];

export interface TestOutcome {
  status: TestStatus;
  name: string;
}

export interface StepPartition {
  done: Step[];
  /** Empty, or the single step the run stopped at. */
  fail: Step[];
  todo: Step[];
}

/** A `RESULT` line emitted by a sequencer run. */
export interface TestResult extends TestOutcome {
  bucket: string;
  stage: string;
  score: number;
  total: number;
  message: string;
}
