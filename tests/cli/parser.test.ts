import { describe, expect, it } from "vitest";
import { UsageError } from "../../src/errors.js";
import { parseArgs } from "../../src/cli/parser.js";

describe("parseArgs", () => {
  it("reads long, short and inline flag values", () => {
    expect(
      parseArgs(["--sequences", "docs/sequences.md", "-a", "out/sequence.md", "--name=extra_config", "--status", "fail"]),
    ).toEqual({
      sequencesPath: "docs/sequences.md",
      actualPath: "out/sequence.md",
      name: "extra_config",
      status: "fail",
      list: false,
      help: false,
    });
  });

  it("reads switches", () => {
    expect(parseArgs(["--list"])).toEqual({ list: true, help: false });
    expect(parseArgs(["-h"])).toEqual({ list: false, help: true });
  });

  it("rejects unknown arguments", () => {
    expect(() => parseArgs(["--verbose"])).toThrow(UsageError);
  });

  it("rejects flags without a value", () => {
    expect(() => parseArgs(["--name"])).toThrow("Missing value for --name");
    expect(() => parseArgs(["--out", "--list"])).toThrow("Missing value for --out");
    expect(() => parseArgs(["--name="])).toThrow("Missing value for --name");
  });
});
