import chalk from "chalk";
import { DONE_MARKER, FAIL_MARKER } from "../sequence/report.js";
import { TestStatus } from "../sequence/types.js";

export function info(msg: string): void {
  console.log(chalk.blue(`[info] ${msg}`));
}

export function success(msg: string): void {
  console.log(chalk.green(`[ok] ${msg}`));
}

export function warn(msg: string): void {
  console.log(chalk.yellow(`[warn] ${msg}`));
}

export function error(msg: string): void {
  console.error(chalk.red(`[error] ${msg}`));
}

export function statusLabel(status: TestStatus): string {
  const colors: Record<TestStatus, (s: string) => string> = {
    pass: chalk.green.bold,
    fail: chalk.red.bold,
    skip: chalk.dim,
    abort: chalk.yellow.bold,
  };
  return colors[status](status.toUpperCase());
}

/** Colors a rendered sequence report line by line for the terminal. */
export function colorReport(report: string): string {
  return report
    .split("\n")
    .map((line) => {
      if (line.startsWith(DONE_MARKER)) return chalk.green(line);
      if (line.startsWith(FAIL_MARKER)) return chalk.red.bold(line);
      if (/^-+$/.test(line)) return chalk.red(line);
      return line;
    })
    .join("\n");
}

export function separator(): void {
  console.log(chalk.dim("─".repeat(60)));
}
