/**
 * Where a report and its progress messages go. The CLI sink writes to the
 * terminal with chalk colors; tests collect into memory.
 */
export interface OutputSink {
  write(text: string): void;
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  separator(): void;
}
