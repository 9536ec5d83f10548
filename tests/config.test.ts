import { describe, expect, it } from "vitest";
import { DEFAULT_SEQUENCES_PATH, loadConfig } from "../src/config/index.js";

describe("loadConfig", () => {
  it("falls back to the default sequences document", () => {
    expect(loadConfig({})).toEqual({ sequencesPath: DEFAULT_SEQUENCES_PATH, resultsPath: undefined });
  });

  it("reads paths from the environment", () => {
    expect(loadConfig({ SEQUENCES_DOC: "docs/sequences.md", SEQUENCER_RESULTS: "out/sequencer.out" })).toEqual({
      sequencesPath: "docs/sequences.md",
      resultsPath: "out/sequencer.out",
    });
  });
});
