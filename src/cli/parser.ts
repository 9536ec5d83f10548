import { UsageError } from "../errors.js";

export interface CliOptions {
  sequencesPath?: string;
  actualPath?: string;
  name?: string;
  status?: string;
  resultsPath?: string;
  outPath?: string;
  list: boolean;
  help: boolean;
}

type ValueFlag = "sequencesPath" | "actualPath" | "name" | "status" | "resultsPath" | "outPath";

const VALUE_FLAGS: Record<string, ValueFlag> = {
  "--sequences": "sequencesPath",
  "-s": "sequencesPath",
  "--actual": "actualPath",
  "-a": "actualPath",
  "--name": "name",
  "-n": "name",
  "--status": "status",
  "--results": "resultsPath",
  "-r": "resultsPath",
  "--out": "outPath",
  "-o": "outPath",
};

/** Accepts `--flag value` and `--flag=value`. */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { list: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--list") {
      options.list = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined || value === "" || value.startsWith("-")) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    options[key] = value;
  }

  return options;
}

export function getHelpText(): string {
  return [
    "Usage: sequence-report [options]",
    "",
    "Renders the progress of one sequence test against its reference steps.",
    "",
    "  -s, --sequences <file>  Sequences document (default: $SEQUENCES_DOC)",
    "  -a, --actual <file>     Steps recorded by the run (sequence.md)",
    "  -n, --name <test>       Sequence name, the `## <name>` section to compare",
    "      --status <status>   Test outcome: pass, fail, skip or abort",
    "  -r, --results <file>    Sequencer output to read the outcome from",
    "                          when --status is omitted (default: $SEQUENCER_RESULTS)",
    "  -o, --out <file>        Write the report to a file instead of stdout",
    "      --list              List the sequences in the sequences document",
    "  -h, --help              Show this help text",
  ].join("\n");
}
