import { ResultParseError } from "../errors.js";
import { TEST_STATUSES, TestResult, TestStatus } from "./types.js";

const RESULT_LINE = /^RESULT\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\d+)\/(\d+)(?:\s+(.*))?$/;

export function isTestStatus(value: string): value is TestStatus {
  return TEST_STATUSES.some((status) => status === value);
}

export function parseStatus(value: string): TestStatus {
  const normalized = value.trim().toLowerCase();
  if (!isTestStatus(normalized)) {
    throw new ResultParseError(
      `Unknown test status "${value}" (expected one of ${TEST_STATUSES.join(", ")})`,
      value,
    );
  }
  return normalized;
}

/**
 * Parses a sequencer result line:
 * `RESULT <status> <bucket> <name> <stage> <score>/<total> <message>`.
 * Lines that are not result lines yield undefined.
 */
export function parseResultLine(line: string): TestResult | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith("RESULT ")) return undefined;

  const match = trimmed.match(RESULT_LINE);
  if (!match) {
    throw new ResultParseError(`Malformed result line: ${trimmed}`, line);
  }

  const [, status, bucket, name, stage, score, total, message] = match;
  return {
    status: parseStatus(status),
    bucket,
    name,
    stage,
    score: Number(score),
    total: Number(total),
    message: message ?? "",
  };
}

export function parseResultLog(text: string): TestResult[] {
  const results: TestResult[] = [];
  for (const line of text.split(/\r?\n/)) {
    const result = parseResultLine(line);
    if (result) results.push(result);
  }
  return results;
}

/** Last result recorded for a test; reruns append to the log. */
export function findResult(results: readonly TestResult[], name: string): TestResult | undefined {
  for (let i = results.length - 1; i >= 0; i--) {
    if (results[i].name === name) return results[i];
  }
  return undefined;
}
