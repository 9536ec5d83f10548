import { Step } from "./types.js";

const STEP_HEADER = /^\d+\.\s/;

export function isStepHeader(line: string): boolean {
  return STEP_HEADER.test(line);
}

/**
 * Splits a sequence body into steps. Numbered list items open a step and
 * every following line belongs to it until the next numbered item. Text
 * before the first item (heading, description) is not part of any step,
 * and blank lines after the last item are dropped.
 */
export function extractSteps(markdown: string): Step[] {
  const steps: string[][] = [];
  let current: string[] | undefined;

  for (const line of markdown.split(/\r?\n/)) {
    if (isStepHeader(line)) {
      if (current) steps.push(current);
      current = [line];
    } else if (current) {
      current.push(line);
    }
  }
  if (current) steps.push(trimTrailingBlanks(current));

  return steps;
}

function trimTrailingBlanks(lines: string[]): string[] {
  let end = lines.length;
  while (end > 1 && lines[end - 1].trim() === "") end--;
  return lines.slice(0, end);
}

export function stepsEqual(a: Step, b: Step): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/** Header text without its list numeral, e.g. `1. Step 2` -> `Step 2`. */
export function stepTitle(step: Step): string {
  return step[0].replace(STEP_HEADER, "").trimStart();
}
