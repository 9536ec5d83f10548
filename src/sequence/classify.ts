import { stepsEqual } from "./steps.js";
import { Step, StepPartition, TestStatus } from "./types.js";

/**
 * Index of the reference step where the run stopped. That is the first step
 * whose content differs from what was observed, or the last observed step
 * when the observed steps are a prefix of the reference. Observed steps past
 * the end of the reference are ignored. Returns -1 when nothing ran.
 */
export function locateFailingStep(reference: readonly Step[], actual: readonly Step[]): number {
  const overlap = Math.min(reference.length, actual.length);
  for (let i = 0; i < overlap; i++) {
    if (!stepsEqual(reference[i], actual[i])) return i;
  }
  return overlap - 1;
}

/**
 * Partitions the reference steps into done, failing and not-yet-run steps.
 * A failed outcome always marks the boundary step as the failure, even when
 * its observed content matches the reference.
 */
export function classifySteps(
  reference: readonly Step[],
  actual: readonly Step[],
  status: TestStatus = "fail",
): StepPartition {
  const boundary = locateFailingStep(reference, actual);

  if (status !== "fail") {
    return {
      done: reference.slice(0, boundary + 1),
      fail: [],
      todo: reference.slice(boundary + 1),
    };
  }

  if (reference.length === 0) return { done: [], fail: [], todo: [] };

  // Nothing observed: the run never got past the first step.
  const failing = Math.max(boundary, 0);
  return {
    done: reference.slice(0, failing),
    fail: [reference[failing]],
    todo: reference.slice(failing + 1),
  };
}
