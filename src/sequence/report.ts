import { classifySteps, locateFailingStep } from "./classify.js";
import { stepsEqual, stepTitle } from "./steps.js";
import { Step, StepPartition, TestOutcome, TestStatus } from "./types.js";

export const DONE_MARKER = "✓";
export const FAIL_MARKER = "✕";
const STEP_COLUMN = 4;
const FAIL_SUFFIX = ` ${FAIL_MARKER}`;

/**
 * Left-pads `text` so that it starts at column `width`, with `marker` at
 * column 0. A marker at least as wide as the column gets a single space.
 */
export function indent(text: string, width: number, marker = ""): string {
  const pad = Math.max(width - displayLength(marker), marker ? 1 : 0);
  return marker + " ".repeat(pad) + text;
}

export function longestLineLength(lines: readonly string[]): number {
  return lines.reduce((max, line) => Math.max(max, displayLength(line)), 0);
}

function displayLength(text: string): number {
  return [...text].length;
}

function numberedHeader(step: Step, position: number): string {
  return `${position}. ${stepTitle(step)}`;
}

function formatStep(step: Step, position: number, marker = "", suffix = ""): string[] {
  const header = indent(numberedHeader(step, position), STEP_COLUMN, marker) + suffix;
  const body = step.slice(1).map((line) => (line.trim() === "" ? "" : indent(line, STEP_COLUMN)));
  return [header, ...body];
}

/**
 * Partition shown in a report. A failed run whose record is a matching,
 * shorter prefix of the reference completed every recorded step and stopped
 * on the next one; otherwise this is `classifySteps`.
 */
export function reportPartition(
  reference: readonly Step[],
  actual: readonly Step[],
  status: TestStatus,
): StepPartition {
  const boundary = locateFailingStep(reference, actual);
  const diverged = boundary >= 0 && !stepsEqual(reference[boundary], actual[boundary]);

  if (status === "fail" && !diverged && actual.length < reference.length) {
    return {
      done: reference.slice(0, actual.length),
      fail: [reference[actual.length]],
      todo: reference.slice(actual.length + 1),
    };
  }
  return classifySteps(reference, actual, status);
}

/** Widest renumbered header or sub-content line, plus the failure suffix. */
function ruleWidth(reference: readonly Step[]): number {
  const lines = reference.flatMap((step, i) => [numberedHeader(step, i + 1), ...step.slice(1)]);
  return longestLineLength(lines) + displayLength(FAIL_SUFFIX);
}

/**
 * Renders the annotated sequence: done steps ticked, the failing step boxed,
 * remaining steps unmarked. Steps are renumbered from 1 regardless of the
 * numerals used in the markdown.
 */
export function formatSequence(
  reference: readonly Step[],
  actual: readonly Step[],
  outcome: TestOutcome,
): string {
  const { done, fail, todo } = reportPartition(reference, actual, outcome.status);
  const rule = "-".repeat(ruleWidth(reference));

  const lines: string[] = [""];
  let position = 1;

  for (const step of done) {
    lines.push(...formatStep(step, position++, DONE_MARKER));
  }

  for (const step of fail) {
    lines.push("", rule, ...formatStep(step, position++, FAIL_MARKER, FAIL_SUFFIX), rule, "");
  }
  if (fail.length === 0 && done.length > 0 && todo.length > 0) {
    lines.push("");
  }

  for (const step of todo) {
    lines.push(...formatStep(step, position++));
  }

  lines.push("");
  return lines.join("\n");
}

export function summarizeSequence(partition: StepPartition, outcome: TestOutcome): string {
  const total = partition.done.length + partition.fail.length + partition.todo.length;
  return `${outcome.name}: ${outcome.status.toUpperCase()} (${partition.done.length}/${total} steps done)`;
}
