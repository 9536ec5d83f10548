#!/usr/bin/env node
import { loadConfig } from "./config/index.js";
import { UsageError } from "./errors.js";
import { createCliSink } from "./cli-sink.js";
import { getHelpText, parseArgs } from "./cli/parser.js";
import * as display from "./cli/display.js";
import { generateReport } from "./report-runner.js";
import { listSequenceNames, readDocument } from "./sequence/documents.js";
import { parseStatus } from "./sequence/results.js";

async function main(argv: readonly string[]): Promise<void> {
  const options = parseArgs(argv);
  if (options.help) {
    console.log(getHelpText());
    return;
  }

  const config = loadConfig();
  const sequencesPath = options.sequencesPath ?? config.sequencesPath;

  if (options.list) {
    const names = listSequenceNames(await readDocument(sequencesPath));
    display.info(`${names.length} sequences in ${sequencesPath}`);
    for (const name of names) console.log(`  ${name}`);
    return;
  }

  if (!options.name) throw new UsageError("Missing --name");
  if (!options.actualPath) throw new UsageError("Missing --actual");

  const { outcome } = await generateReport(
    {
      sequencesPath,
      actualPath: options.actualPath,
      name: options.name,
      status: options.status === undefined ? undefined : parseStatus(options.status),
      resultsPath: options.resultsPath ?? config.resultsPath,
      outPath: options.outPath,
    },
    createCliSink(),
  );
  display.info(`Outcome: ${display.statusLabel(outcome.status)}`);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  display.error(message);
  if (err instanceof UsageError) {
    console.error(`\n${getHelpText()}`);
    process.exitCode = 2;
  } else {
    process.exitCode = 1;
  }
});
