import "dotenv/config";
import { AppConfig } from "./types.js";

export const DEFAULT_SEQUENCES_PATH = "docs/specs/sequences/generated.md";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    sequencesPath: env.SEQUENCES_DOC || DEFAULT_SEQUENCES_PATH,
    resultsPath: env.SEQUENCER_RESULTS || undefined,
  };
}

export type { AppConfig } from "./types.js";
