import fs from "fs/promises";
import path from "path";
import { SequenceDocumentError } from "./errors.js";
import type { OutputSink } from "./output-sink.js";
import { findSequenceSection, readDocument, readSequenceSteps } from "./sequence/documents.js";
import { formatSequence, reportPartition, summarizeSequence } from "./sequence/report.js";
import { findResult, parseResultLog } from "./sequence/results.js";
import { extractSteps } from "./sequence/steps.js";
import { Step, StepPartition, TestOutcome, TestStatus } from "./sequence/types.js";

export interface ReportOptions {
  sequencesPath: string;
  actualPath: string;
  name: string;
  /** Takes precedence over the result log. */
  status?: TestStatus;
  resultsPath?: string;
  outPath?: string;
}

export interface ReportSummary {
  outcome: TestOutcome;
  partition: StepPartition;
  report: string;
}

/**
 * Builds the progress report for one test: reference steps from the
 * sequences document, observed steps from the run's own sequence record,
 * outcome from the options or the sequencer's result log.
 */
export async function generateReport(options: ReportOptions, sink: OutputSink): Promise<ReportSummary> {
  const reference = await readSequenceSteps(options.sequencesPath, options.name);
  sink.info(`Loaded ${countOf(reference.length, "reference step")} for ${options.name}`);
  if (reference.length === 0) {
    sink.warn(`Sequence ${options.name} has no numbered steps`);
  }

  const actual = await readActualSteps(options.actualPath, options.name);
  sink.info(`Run recorded ${countOf(actual.length, "step")}`);
  if (actual.length > reference.length) {
    const extra = actual.length - reference.length;
    sink.warn(`Run recorded ${countOf(extra, "step")} beyond the reference; ignoring ${extra === 1 ? "it" : "them"}`);
  }

  const outcome = await resolveOutcome(options);
  const partition = reportPartition(reference, actual, outcome.status);
  const report = formatSequence(reference, actual, outcome);

  if (options.outPath) {
    await fs.mkdir(path.dirname(options.outPath), { recursive: true });
    await fs.writeFile(options.outPath, report, "utf-8");
    sink.success(`Report written to ${options.outPath}`);
  } else {
    sink.write(report);
  }
  const summary = summarizeSequence(partition, outcome);
  if (partition.fail.length > 0) sink.warn(summary);
  else sink.success(summary);

  return { outcome, partition, report };
}

function countOf(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** A run record may hold just the step list or a full `## <name>` section. */
async function readActualSteps(filePath: string, name: string): Promise<Step[]> {
  const document = await readDocument(filePath);
  return extractSteps(findSequenceSection(document, name) ?? document);
}

async function resolveOutcome(options: ReportOptions): Promise<TestOutcome> {
  if (options.status) return { status: options.status, name: options.name };

  if (!options.resultsPath) {
    throw new SequenceDocumentError(`No status given for ${options.name} and no result log configured`);
  }
  const results = parseResultLog(await readDocument(options.resultsPath));
  const result = findResult(results, options.name);
  if (!result) {
    throw new SequenceDocumentError(`No result for ${options.name} in ${options.resultsPath}`);
  }
  return { status: result.status, name: result.name };
}
