import type { OutputSink } from "./output-sink.js";
import * as display from "./cli/display.js";

export function createCliSink(): OutputSink {
  return {
    write(text: string) {
      process.stdout.write(display.colorReport(text));
    },
    info(msg: string) {
      display.info(msg);
    },
    success(msg: string) {
      display.success(msg);
    },
    warn(msg: string) {
      display.warn(msg);
    },
    error(msg: string) {
      display.error(msg);
    },
    separator() {
      display.separator();
    },
  };
}
