export interface AppConfig {
  /** Markdown document holding every `## <name>` sequence section. */
  sequencesPath: string;
  /** Sequencer output with RESULT lines, when the status is not given. */
  resultsPath?: string;
}
